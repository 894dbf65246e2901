import { Transaction } from "../../bitcoin/transaction";
import { UtxoSet } from "../../bitcoin/utxo-set";
import { ScriptEngineConfig } from "../../config/engine-config";
import { TransactionReader } from "../../transaction/read/transaction-reader";
import { OperationCatalog } from "../ops/catalog";
import { ScriptEngine } from "./script-engine";

export type TransactionInputVerifyResult = {
  inputIndex: number;
  success: boolean;
  /** Extracted address of the input's program, "" when none. */
  address: string;
  error?: string;
};

export type TransactionVerifyResult = {
  txId: string;
  success: boolean;
  inputs: TransactionInputVerifyResult[];
  errors: string[];
};

export type TransactionVerifyOptions = {
  catalog?: OperationCatalog;
  config?: ScriptEngineConfig;
};

/** Runs the unlocking script of every input against the output it spends. */
export const verifyTransaction = (
  tx: Transaction,
  utxos: UtxoSet,
  options?: TransactionVerifyOptions,
): TransactionVerifyResult => {
  const inputs: TransactionInputVerifyResult[] = [];
  const errors: string[] = [];

  tx.Inputs.forEach((input, inputIndex) => {
    const spent = utxos.get(input.TxId, input.Vout);

    if (!spent) {
      const error = `Missing prev output for input ${inputIndex}: ${input.TxId}:${input.Vout}`;
      inputs.push({ inputIndex, success: false, address: "", error });
      errors.push(error);
      return;
    }

    const parsed = ScriptEngine.tryParse(
      input.UnlockingScript,
      spent.LockingScript,
      options?.catalog,
      options?.config,
    );

    if (!parsed.success) {
      const error = `Parse error: ${parsed.error.message}`;
      inputs.push({ inputIndex, success: false, address: "", error });
      errors.push(`Input ${inputIndex} failed: ${error}`);
      return;
    }

    const result = parsed.engine.evaluate(tx, inputIndex, utxos, {
      config: options?.config,
    });
    const address = parsed.engine.getExtractedAddress();

    if (result.success) {
      inputs.push({ inputIndex, success: true, address });
    } else {
      inputs.push({ inputIndex, success: false, address, error: result.error });
      errors.push(`Input ${inputIndex} failed: ${result.error}`);
    }
  });

  return {
    txId: tx.Id,
    success: inputs.every((r) => r.success),
    inputs,
    errors,
  };
};

export const verifyTransactionHex = (
  txHex: string,
  utxos: UtxoSet,
  options?: TransactionVerifyOptions,
) => verifyTransaction(TransactionReader.readHex(txHex), utxos, options);
