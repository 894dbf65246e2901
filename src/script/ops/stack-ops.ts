import { OpCode } from "../../bitcoin/op-codes";
import { cloneBytes } from "../../buffer/buffer-utils";
import { ScriptEvalError } from "../errors";
import { ScriptContext } from "../eval/execution-context";
import { decodeScriptNum, encodeScriptNum, isTruthy } from "../script-num";
import { NamedOperation, ScriptOperation } from "./operation";

const requireDepth = (ctx: ScriptContext, depth: number) => {
  if (ctx.depth < depth) throw new ScriptEvalError("Stack underflow");
};

const popIndex = (ctx: ScriptContext, name: string) => {
  const n = Number(decodeScriptNum(ctx.pop()));
  if (n < 0 || n >= ctx.depth)
    throw new ScriptEvalError(`${name} out of range`);
  return n;
};

export const stackOperations: ScriptOperation[] = [
  new NamedOperation(OpCode.OP_2DROP, (ctx) => {
    requireDepth(ctx, 2);
    ctx.pop();
    ctx.pop();
  }),
  new NamedOperation(OpCode.OP_2DUP, (ctx) => {
    requireDepth(ctx, 2);
    const b = ctx.peek(1);
    const a = ctx.peek(0);
    ctx.push(cloneBytes(b));
    ctx.push(cloneBytes(a));
  }),
  new NamedOperation(OpCode.OP_3DUP, (ctx) => {
    requireDepth(ctx, 3);
    const c = ctx.peek(2);
    const b = ctx.peek(1);
    const a = ctx.peek(0);
    ctx.push(cloneBytes(c));
    ctx.push(cloneBytes(b));
    ctx.push(cloneBytes(a));
  }),
  new NamedOperation(OpCode.OP_2OVER, (ctx) => {
    requireDepth(ctx, 4);
    const b = ctx.peek(3);
    const a = ctx.peek(2);
    ctx.push(cloneBytes(b));
    ctx.push(cloneBytes(a));
  }),
  new NamedOperation(OpCode.OP_2SWAP, (ctx) => {
    requireDepth(ctx, 4);
    const b = ctx.removeAt(3);
    const a = ctx.removeAt(2);
    ctx.push(b);
    ctx.push(a);
  }),
  new NamedOperation(OpCode.OP_IFDUP, (ctx) => {
    const top = ctx.peek();
    if (isTruthy(top)) ctx.push(cloneBytes(top));
  }),
  new NamedOperation(OpCode.OP_DEPTH, (ctx) =>
    ctx.push(encodeScriptNum(BigInt(ctx.depth))),
  ),
  new NamedOperation(OpCode.OP_DROP, (ctx) => {
    ctx.pop();
  }),
  new NamedOperation(OpCode.OP_DUP, (ctx) => ctx.push(cloneBytes(ctx.peek()))),
  new NamedOperation(OpCode.OP_NIP, (ctx) => {
    ctx.removeAt(1);
  }),
  new NamedOperation(OpCode.OP_OVER, (ctx) =>
    ctx.push(cloneBytes(ctx.peek(1))),
  ),
  new NamedOperation(OpCode.OP_PICK, (ctx) => {
    const n = popIndex(ctx, "OP_PICK");
    ctx.push(cloneBytes(ctx.peek(n)));
  }),
  new NamedOperation(OpCode.OP_ROLL, (ctx) => {
    const n = popIndex(ctx, "OP_ROLL");
    ctx.push(ctx.removeAt(n));
  }),
  new NamedOperation(OpCode.OP_ROT, (ctx) => {
    requireDepth(ctx, 3);
    ctx.push(ctx.removeAt(2));
  }),
  new NamedOperation(OpCode.OP_SWAP, (ctx) => {
    requireDepth(ctx, 2);
    ctx.push(ctx.removeAt(1));
  }),
  new NamedOperation(OpCode.OP_TUCK, (ctx) => {
    requireDepth(ctx, 2);
    const a = ctx.pop();
    const b = ctx.pop();
    ctx.push(cloneBytes(a));
    ctx.push(b);
    ctx.push(a);
  }),
  new NamedOperation(OpCode.OP_SIZE, (ctx) =>
    ctx.push(encodeScriptNum(BigInt(ctx.peek().length))),
  ),
];
