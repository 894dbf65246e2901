import { verify as nobleVerify } from "@noble/secp256k1";
import { OpCode } from "../../bitcoin/op-codes";
import { Bytes } from "../../bytes";
import { hash160, hash256, ripemd160, sha1, sha256 } from "../../hashes";
import { ScriptEvalError } from "../errors";
import { ScriptContext } from "../eval/execution-context";
import { legacySignatureHash } from "../eval/sighash";
import { ScriptReader } from "../read/script-reader";
import { encodeBool } from "../script-num";
import { NamedOperation, ScriptOperation } from "./operation";

const hashing = (opcode: OpCode, fn: (data: Bytes) => Bytes) =>
  new NamedOperation(opcode, (ctx) => ctx.push(fn(ctx.pop())));

/**
 * Checks `sigWithType` (DER signature + one hash type byte) against the
 * input being validated. The script code is the locking script of the
 * spent output, taken from the UTXO snapshot.
 */
export const checkSignature = (
  ctx: ScriptContext,
  sigWithType: Bytes,
  pubKey: Bytes,
): boolean => {
  if (sigWithType.length === 0) return false;

  const tx = ctx.getTransaction();
  const inputIndex = ctx.getInputIndex();
  const input = tx.Inputs[inputIndex];
  if (!input) throw new ScriptEvalError("Input index out of range");

  const spent = ctx.getUtxo(input.TxId, input.Vout);
  if (!spent)
    throw new ScriptEvalError(`Missing UTXO ${input.TxId}:${input.Vout}`);

  const hashType = sigWithType[sigWithType.length - 1];
  const signature = sigWithType.subarray(0, sigWithType.length - 1);
  const scriptCode = ScriptReader.removeDataPush(
    spent.LockingScript,
    sigWithType,
  );
  const msg = legacySignatureHash(tx, inputIndex, scriptCode, hashType);

  try {
    return nobleVerify(signature, msg, pubKey, {
      strict: ctx.getConfig().strictLowS,
    });
  } catch {
    return false;
  }
};

export const cryptoOperations: ScriptOperation[] = [
  hashing(OpCode.OP_RIPEMD160, ripemd160),
  hashing(OpCode.OP_SHA1, sha1),
  hashing(OpCode.OP_SHA256, sha256),
  hashing(OpCode.OP_HASH160, hash160),
  hashing(OpCode.OP_HASH256, hash256),

  new NamedOperation(OpCode.OP_CHECKSIG, (ctx) => {
    const pubKey = ctx.pop();
    const sigWithType = ctx.pop();
    ctx.push(encodeBool(checkSignature(ctx, sigWithType, pubKey)));
  }),
  new NamedOperation(OpCode.OP_CHECKSIGVERIFY, (ctx) => {
    const pubKey = ctx.pop();
    const sigWithType = ctx.pop();
    if (!checkSignature(ctx, sigWithType, pubKey))
      throw new ScriptEvalError("OP_CHECKSIGVERIFY failed");
  }),
];
