import { ByteWriter } from "../../binary";
import { SignatureHashType } from "../../bitcoin/sig-hash-type";
import { Transaction } from "../../bitcoin/transaction";
import { TransactionInput } from "../../bitcoin/transaction-input";
import { TransactionOutput } from "../../bitcoin/transaction-output";
import { Bytes, EMPTY_BYTES } from "../../bytes";
import { hash256 } from "../../hashes";
import {
  TransactionParts,
  TransactionWriter,
} from "../../transaction/write/transaction-writer";
import { ScriptEvalError } from "../errors";

const BLANK_SATOSHIS = new Uint8Array(8).fill(0xff);

const singleOutOfRangeHash = (): Bytes => {
  const hash = new Uint8Array(32);
  hash[0] = 1;
  return hash;
};

const writePreimage = (parts: TransactionParts, hashType: number) => {
  const writer = ByteWriter.fromSize(TransactionWriter.size(parts) + 4);

  writer.writeUInt32(parts.version);
  writer.writeVarInt(parts.inputs.length);
  for (const input of parts.inputs) TransactionWriter.writeInput(writer, input);

  writer.writeVarInt(parts.outputs.length);
  for (const output of parts.outputs) {
    // blanked SIGHASH_SINGLE outputs carry -1 as value
    if (output.Satoshis < 0) {
      writer.writeChunk(BLANK_SATOSHIS);
      writer.writeVarChunk(output.LockingScript);
    } else {
      TransactionWriter.writeOutput(writer, output);
    }
  }

  writer.writeUInt32(parts.lockTime);
  writer.writeUInt32(hashType);

  return writer.buffer;
};

/**
 * Legacy (pre-segwit) signature hash of input `inputIndex`.
 *
 * `scriptCode` replaces the signed input's script and every other input
 * script is emptied. SIGHASH_SINGLE without a matching output hashes to
 * the value 1.
 */
export const legacySignatureHash = (
  tx: Transaction,
  inputIndex: number,
  scriptCode: Bytes,
  hashType: number,
): Bytes => {
  if (inputIndex < 0 || inputIndex >= tx.Inputs.length)
    throw new ScriptEvalError("Input index out of range");

  const baseType = hashType & 0x1f;
  const anyoneCanPay =
    (hashType & SignatureHashType.SIGHASH_ANYONECANPAY) !== 0;
  const isNone = baseType === SignatureHashType.SIGHASH_NONE;
  const isSingle = baseType === SignatureHashType.SIGHASH_SINGLE;

  if (isSingle && inputIndex >= tx.Outputs.length)
    return singleOutOfRangeHash();

  const signed = tx.Inputs[inputIndex];
  const inputs = anyoneCanPay
    ? [
        new TransactionInput(
          signed.TxId,
          signed.Vout,
          scriptCode,
          signed.Sequence,
        ),
      ]
    : tx.Inputs.map((input, i) =>
        i === inputIndex
          ? new TransactionInput(
              input.TxId,
              input.Vout,
              scriptCode,
              input.Sequence,
            )
          : new TransactionInput(
              input.TxId,
              input.Vout,
              EMPTY_BYTES,
              isNone || isSingle ? 0 : input.Sequence,
            ),
      );

  let outputs: TransactionOutput[] = tx.Outputs;
  if (isNone) {
    outputs = [];
  } else if (isSingle) {
    outputs = tx.Outputs.slice(0, inputIndex + 1).map((output, i) =>
      i === inputIndex ? output : new TransactionOutput(-1, EMPTY_BYTES),
    );
  }

  return hash256(
    writePreimage(
      { version: tx.Version, inputs, outputs, lockTime: tx.LockTime },
      hashType >>> 0,
    ),
  );
};
