import { OpCode } from "../../bitcoin/op-codes";
import { equal } from "../../bytes";
import { ScriptEvalError } from "../errors";
import { ScriptContext } from "../eval/execution-context";
import { decodeScriptNum, encodeBool, encodeScriptNum } from "../script-num";
import { NamedOperation, ScriptOperation } from "./operation";

const ZERO = BigInt(0);
const ONE = BigInt(1);

const popNum = (ctx: ScriptContext) => decodeScriptNum(ctx.pop());

const unary = (opcode: OpCode, fn: (a: bigint) => bigint | boolean) =>
  new NamedOperation(opcode, (ctx) => {
    const result = fn(popNum(ctx));
    ctx.push(
      typeof result === "boolean" ? encodeBool(result) : encodeScriptNum(result),
    );
  });

const binary = (opcode: OpCode, fn: (a: bigint, b: bigint) => bigint | boolean) =>
  new NamedOperation(opcode, (ctx) => {
    const b = popNum(ctx);
    const a = popNum(ctx);
    const result = fn(a, b);
    ctx.push(
      typeof result === "boolean" ? encodeBool(result) : encodeScriptNum(result),
    );
  });

export const arithmeticOperations: ScriptOperation[] = [
  new NamedOperation(OpCode.OP_EQUAL, (ctx) => {
    const b = ctx.pop();
    const a = ctx.pop();
    ctx.push(encodeBool(equal(a, b)));
  }),
  new NamedOperation(OpCode.OP_EQUALVERIFY, (ctx) => {
    const b = ctx.pop();
    const a = ctx.pop();
    if (!equal(a, b)) throw new ScriptEvalError("OP_EQUALVERIFY failed");
  }),

  unary(OpCode.OP_1ADD, (a) => a + ONE),
  unary(OpCode.OP_1SUB, (a) => a - ONE),
  unary(OpCode.OP_NEGATE, (a) => -a),
  unary(OpCode.OP_ABS, (a) => (a < ZERO ? -a : a)),
  unary(OpCode.OP_NOT, (a) => a === ZERO),
  unary(OpCode.OP_0NOTEQUAL, (a) => a !== ZERO),

  binary(OpCode.OP_ADD, (a, b) => a + b),
  binary(OpCode.OP_SUB, (a, b) => a - b),
  binary(OpCode.OP_BOOLAND, (a, b) => a !== ZERO && b !== ZERO),
  binary(OpCode.OP_BOOLOR, (a, b) => a !== ZERO || b !== ZERO),
  binary(OpCode.OP_NUMEQUAL, (a, b) => a === b),
  new NamedOperation(OpCode.OP_NUMEQUALVERIFY, (ctx) => {
    const b = popNum(ctx);
    const a = popNum(ctx);
    if (a !== b) throw new ScriptEvalError("OP_NUMEQUALVERIFY failed");
  }),
  binary(OpCode.OP_NUMNOTEQUAL, (a, b) => a !== b),
  binary(OpCode.OP_LESSTHAN, (a, b) => a < b),
  binary(OpCode.OP_GREATERTHAN, (a, b) => a > b),
  binary(OpCode.OP_LESSTHANOREQUAL, (a, b) => a <= b),
  binary(OpCode.OP_GREATERTHANOREQUAL, (a, b) => a >= b),
  binary(OpCode.OP_MIN, (a, b) => (a < b ? a : b)),
  binary(OpCode.OP_MAX, (a, b) => (a > b ? a : b)),

  new NamedOperation(OpCode.OP_WITHIN, (ctx) => {
    const max = popNum(ctx);
    const min = popNum(ctx);
    const x = popNum(ctx);
    ctx.push(encodeBool(x >= min && x < max));
  }),
];
