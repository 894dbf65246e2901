import { Transaction } from "./transaction";
import { TransactionOutput } from "./transaction-output";

/**
 * Snapshot of previously-unspent outputs keyed by (source tx id, output index).
 *
 * Keys are held in nested maps so a tx id is never glued to its index
 * through a separator. Tx ids are compared as lowercase hex.
 */
export class UtxoSet {
  private readonly outputs = new Map<string, Map<number, TransactionOutput>>();

  static fromTransactions = (transactions: Transaction[]) => {
    const set = new UtxoSet();

    for (const tx of transactions) {
      tx.Outputs.forEach((output, vout) => set.add(tx.Id, vout, output));
    }

    return set;
  };

  add = (txId: string, vout: number, output: TransactionOutput) => {
    const key = txId.toLowerCase();
    let byIndex = this.outputs.get(key);

    if (!byIndex) {
      byIndex = new Map();
      this.outputs.set(key, byIndex);
    }

    byIndex.set(vout, output);

    return this;
  };

  get = (txId: string, vout: number): TransactionOutput | undefined =>
    this.outputs.get(txId.toLowerCase())?.get(vout);

  has = (txId: string, vout: number) => this.get(txId, vout) !== undefined;

  get size() {
    let total = 0;
    for (const byIndex of this.outputs.values()) total += byIndex.size;
    return total;
  }
}
