import { OpCode } from "../../bitcoin/op-codes";
import { ScriptEvalError } from "../errors";
import { ScriptContext } from "../eval/execution-context";
import { encodeScriptNum, isTruthy } from "../script-num";
import { NamedOperation, ScriptOperation } from "./operation";

/** Pops the top element and fails unless it is truthy. */
export const executeVerify = (context: ScriptContext): boolean => {
  if (context.depth === 0) return context.fail("Stack underflow");
  const ok = isTruthy(context.pop());
  return ok || context.fail("Top of stack is false");
};

const smallIntegers = (): ScriptOperation[] => {
  const result: ScriptOperation[] = [];

  for (let n = 1; n <= 16; n++) {
    const value = encodeScriptNum(BigInt(n));
    result.push(
      new NamedOperation(OpCode.OP_1 + n - 1, (ctx) => ctx.push(value)),
    );
  }

  return result;
};

const nops = [
  OpCode.OP_NOP,
  OpCode.OP_NOP1,
  OpCode.OP_NOP4,
  OpCode.OP_NOP5,
  OpCode.OP_NOP6,
  OpCode.OP_NOP7,
  OpCode.OP_NOP8,
  OpCode.OP_NOP9,
  OpCode.OP_NOP10,
].map((opcode) => new NamedOperation(opcode, () => {}));

export const flowOperations: ScriptOperation[] = [
  new NamedOperation(OpCode.OP_0, (ctx) => ctx.push(new Uint8Array())),
  new NamedOperation(OpCode.OP_1NEGATE, (ctx) =>
    ctx.push(encodeScriptNum(BigInt(-1))),
  ),
  ...smallIntegers(),
  ...nops,
  new NamedOperation(OpCode.OP_VERIFY, (ctx) => {
    if (!isTruthy(ctx.pop())) throw new ScriptEvalError("OP_VERIFY failed");
  }),
  new NamedOperation(OpCode.OP_RETURN, () => {
    throw new ScriptEvalError("OP_RETURN");
  }),
];
