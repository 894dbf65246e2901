import { getOpCodeName } from "../../bitcoin/op-codes";
import { Bytes, toHex } from "../../bytes";
import { ScriptEvalError } from "../errors";
import { ScriptContext } from "../eval/execution-context";

/**
 * One step of a parsed program. Implementations hold no per-run state and
 * are shared between every script that uses them.
 */
export interface ScriptOperation {
  readonly opCodeNum: number;
  readonly name: string;
  execute(context: ScriptContext): boolean;
  toString(): string;
}

/** Push of a 1..75 byte literal; the opcode byte is the literal's length. */
export class DataOperation implements ScriptOperation {
  readonly opCodeNum: number;
  readonly name: string;
  readonly data: Bytes;

  constructor(data: Bytes) {
    this.opCodeNum = data.length;
    this.name = `PUSH(${data.length})`;
    this.data = data;
  }

  execute = (context: ScriptContext) => {
    context.push(this.data);
    return true;
  };

  toString = () => `${this.name} ${toHex(this.data)}`;
}

/**
 * Handler of a named opcode. Returning `false` or throwing a
 * `ScriptEvalError` both mean the script failed; returning nothing means
 * the step succeeded.
 */
export type OperationHandler = (context: ScriptContext) => boolean | void;

export class NamedOperation implements ScriptOperation {
  readonly opCodeNum: number;
  readonly name: string;
  private readonly handler: OperationHandler;

  constructor(opCodeNum: number, handler: OperationHandler, name?: string) {
    this.opCodeNum = opCodeNum;
    this.name =
      name ??
      getOpCodeName(opCodeNum) ??
      `OP_UNKNOWN_0x${opCodeNum.toString(16)}`;
    this.handler = handler;
  }

  execute = (context: ScriptContext) => {
    try {
      if (this.handler(context) === false)
        return context.fail(`${this.name} failed`);
      return true;
    } catch (err) {
      if (err instanceof ScriptEvalError) return context.fail(err.message);
      throw err;
    }
  };

  toString = () => this.name;
}
