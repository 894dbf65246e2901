import { Transaction } from "../../bitcoin/transaction";
import { TransactionOutput } from "../../bitcoin/transaction-output";
import { UtxoSet } from "../../bitcoin/utxo-set";
import { cloneBytes } from "../../buffer/buffer-utils";
import { Bytes } from "../../bytes";
import {
  ScriptEngineConfig,
  getScriptEngineConfig,
} from "../../config/engine-config";
import { ScriptEvalError } from "../errors";

/** What an operation may see and touch while it runs. */
export interface ScriptContext {
  push(value: Bytes): void;
  pop(): Bytes;
  peek(depth?: number): Bytes;
  removeAt(depth: number): Bytes;
  readonly depth: number;
  getTransaction(): Transaction;
  getInputIndex(): number;
  getUtxo(txId: string, vout: number): TransactionOutput | undefined;
  getConfig(): ScriptEngineConfig;
  fail(reason: string): false;
}

/**
 * Per-run state: one operand stack bound to the transaction input being
 * validated. Built fresh by every `execute` call and dropped afterwards.
 */
export class ExecutionContext implements ScriptContext {
  private readonly stack: Bytes[] = [];
  private readonly tx: Transaction;
  private readonly inputIndex: number;
  private readonly utxos: UtxoSet;
  private readonly config: ScriptEngineConfig;
  private failure?: string;

  constructor(
    tx: Transaction,
    inputIndex: number,
    utxos: UtxoSet,
    config: ScriptEngineConfig = getScriptEngineConfig(),
  ) {
    this.tx = tx;
    this.inputIndex = inputIndex;
    this.utxos = utxos;
    this.config = config;
  }

  get depth() {
    return this.stack.length;
  }

  push = (value: Bytes) => {
    this.stack.push(value);
  };

  pop = (): Bytes => {
    const value = this.stack.pop();
    if (value === undefined) throw new ScriptEvalError("Stack underflow");
    return value;
  };

  /** Element `depth` positions below the top; 0 is the top itself. */
  peek = (depth = 0): Bytes => {
    if (depth < 0 || depth >= this.stack.length)
      throw new ScriptEvalError("Stack underflow");
    return this.stack[this.stack.length - 1 - depth];
  };

  removeAt = (depth: number): Bytes => {
    const value = this.peek(depth);
    this.stack.splice(this.stack.length - 1 - depth, 1);
    return value;
  };

  /** Copies of the stack elements, bottom first. */
  getStack = (): Bytes[] => this.stack.map(cloneBytes);

  getTransaction = () => this.tx;

  getInputIndex = () => this.inputIndex;

  getUtxo = (txId: string, vout: number) => this.utxos.get(txId, vout);

  getConfig = () => this.config;

  fail = (reason: string): false => {
    if (this.failure === undefined) this.failure = reason;
    return false;
  };

  getFailure = () => this.failure;
}
