import { Address } from "../../bitcoin/address";
import { MAX_DIRECT_PUSH } from "../../bitcoin/op-codes";
import { Transaction } from "../../bitcoin/transaction";
import { UtxoSet } from "../../bitcoin/utxo-set";
import { ByteReader } from "../../binary";
import { Bytes, concat, toHex } from "../../bytes";
import {
  ScriptEngineConfig,
  getScriptEngineConfig,
} from "../../config/engine-config";
import { logger } from "../../logger";
import { ScriptEvalError, ScriptParseError } from "../errors";
import { DefaultCatalog, OperationCatalog } from "../ops/catalog";
import { executeVerify } from "../ops/flow-ops";
import { DataOperation, ScriptOperation } from "../ops/operation";
import { ExecutionContext } from "./execution-context";

export type ScriptTraceStep = {
  pc: number;
  operation: string;
  success: boolean;
  stackDepth: number;
  stackTopHex?: string;
};

export type ScriptExecuteOptions = {
  /** Called after every operation, including the one that failed. */
  onStep?: (step: ScriptTraceStep) => void;
  /** Collect steps into the result, capped at the configured trace limit. */
  trace?: boolean;
  config?: ScriptEngineConfig;
};

export type ScriptEvalResult = {
  success: boolean;
  error?: string;
  /** Index of the operation that failed; absent when the final check failed. */
  failedAt?: number;
  stack: Bytes[];
  trace?: ScriptTraceStep[];
};

export type ScriptParseResult =
  | { success: true; engine: ScriptEngine }
  | { success: false; error: ScriptParseError };

const HASH160_PUSH_LENGTH = 20;
const UNCOMPRESSED_PUBKEY_PUSH_LENGTH = 65;

const extractAddress = (data: Bytes, config: ScriptEngineConfig) => {
  if (data.length === HASH160_PUSH_LENGTH)
    return Address.fromHash160(data, config.network).Value;
  if (data.length === UNCOMPRESSED_PUBKEY_PUSH_LENGTH)
    return Address.fromPublicKey(data, config.network).Value;
  return undefined;
};

/**
 * A parsed (unlocking + locking) program. Holds no execution state, so one
 * engine may be executed any number of times.
 */
export class ScriptEngine {
  private readonly operations: readonly ScriptOperation[];
  private readonly address: string;

  private constructor(operations: ScriptOperation[], address: string) {
    this.operations = operations;
    this.address = address;
  }

  /**
   * Decodes `unlockingScript` followed by `lockingScript`.
   *
   * The first 20-byte push (a hash160) or 65-byte push (an uncompressed
   * public key) becomes the extracted address; later ones are ignored.
   *
   * @throws {ScriptParseError} on an opcode missing from `catalog` or a
   * push running past the end of the scripts.
   */
  static parse = (
    unlockingScript: Bytes,
    lockingScript: Bytes,
    catalog: OperationCatalog = DefaultCatalog,
    config: ScriptEngineConfig = getScriptEngineConfig(),
  ): ScriptEngine => {
    const reader = new ByteReader(concat([unlockingScript, lockingScript]));
    const operations: ScriptOperation[] = [];
    let address: string | undefined;

    while (!reader.eof) {
      const offset = reader.offset;
      const opcode = reader.readUInt8();
      let operation: ScriptOperation | undefined;

      if (opcode >= 1 && opcode <= MAX_DIRECT_PUSH) {
        if (reader.remaining < opcode)
          throw ScriptParseError.truncatedPush(opcode, offset, reader.remaining);

        const data = reader.readChunk(opcode);
        operation = new DataOperation(data);

        if (address === undefined) address = extractAddress(data, config);
      } else {
        operation = catalog.lookup(opcode);

        if (!operation) throw ScriptParseError.unsupportedOpcode(opcode, offset);
      }

      logger.debug({ offset, operation: operation.toString() }, "parsed op");
      operations.push(operation);
    }

    return new ScriptEngine(operations, address ?? "");
  };

  static tryParse = (
    unlockingScript: Bytes,
    lockingScript: Bytes,
    catalog?: OperationCatalog,
    config?: ScriptEngineConfig,
  ): ScriptParseResult => {
    try {
      return {
        success: true,
        engine: ScriptEngine.parse(unlockingScript, lockingScript, catalog, config),
      };
    } catch (err) {
      if (err instanceof ScriptParseError) return { success: false, error: err };
      throw err;
    }
  };

  getOperations = () => this.operations;

  /** Address found while parsing, or "" when none was found. */
  getExtractedAddress = () => this.address;

  execute = (
    tx: Transaction,
    inputIndex: number,
    utxos: UtxoSet,
    options?: ScriptExecuteOptions,
  ): boolean => this.evaluate(tx, inputIndex, utxos, options).success;

  /**
   * Runs every operation in order, stopping at the first failure, then
   * requires a truthy element on top of the stack.
   */
  evaluate = (
    tx: Transaction,
    inputIndex: number,
    utxos: UtxoSet,
    options?: ScriptExecuteOptions,
  ): ScriptEvalResult => {
    const config = options?.config ?? getScriptEngineConfig();
    const context = new ExecutionContext(tx, inputIndex, utxos, config);
    const collect = options?.trace === true;
    const trace: ScriptTraceStep[] = [];

    const record = (pc: number, operation: ScriptOperation, success: boolean) => {
      if (!options?.onStep && !collect) return;

      const step: ScriptTraceStep = {
        pc,
        operation: operation.toString(),
        success,
        stackDepth: context.depth,
        stackTopHex: context.depth > 0 ? toHex(context.peek()) : undefined,
      };

      options?.onStep?.(step);
      if (collect) {
        trace.push(step);
        if (trace.length > config.traceLimit) trace.shift();
      }
    };

    logger.debug({ tx: tx.Id, inputIndex }, "execute script");

    for (let pc = 0; pc < this.operations.length; pc++) {
      const operation = this.operations[pc];
      let ok: boolean;

      try {
        ok = operation.execute(context);
      } catch (err) {
        if (!(err instanceof ScriptEvalError)) throw err;
        ok = context.fail(err.message);
      }

      record(pc, operation, ok);

      if (!ok) {
        const error = context.getFailure() ?? `${operation} failed`;
        logger.debug({ pc, operation: operation.toString(), error }, "script failed");

        return {
          success: false,
          error,
          failedAt: pc,
          stack: context.getStack(),
          trace: collect ? trace : undefined,
        };
      }
    }

    const success = executeVerify(context);
    const error = success ? undefined : context.getFailure();
    if (!success) logger.debug({ error }, "final stack check failed");

    return {
      success,
      error,
      stack: context.getStack(),
      trace: collect ? trace : undefined,
    };
  };

  describe = () =>
    [
      "-- BEGIN ----",
      this.operations.map((operation) => operation.toString()).join("\n"),
      "-- END ----",
    ].join("\n");

  toString = () => this.describe();
}
