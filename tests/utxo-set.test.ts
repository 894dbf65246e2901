import { TransactionOutput } from "../src/bitcoin/transaction-output";
import { UtxoSet } from "../src/bitcoin/utxo-set";
import { fromHex } from "../src/bytes";
import { TransactionReader } from "../src/transaction/read/transaction-reader";
import { ThreeOutputTxId, ThreeOutputTxRaw } from "./fixtures/transactions";

describe("utxo set", () => {
  test("looks outputs up by tx id and index", () => {
    const first = new TransactionOutput(100, fromHex("51"));
    const second = new TransactionOutput(200, fromHex("52"));
    const set = new UtxoSet()
      .add("aa".repeat(32), 0, first)
      .add("aa".repeat(32), 1, second);

    expect(set.get("aa".repeat(32), 0)).toBe(first);
    expect(set.get("aa".repeat(32), 1)).toBe(second);
    expect(set.get("aa".repeat(32), 2)).toBeUndefined();
    expect(set.get("bb".repeat(32), 0)).toBeUndefined();
    expect(set.size).toBe(2);
  });

  test("tx id comparison ignores hex case", () => {
    const output = new TransactionOutput(1, fromHex("51"));
    const set = new UtxoSet().add("AB".repeat(32), 3, output);

    expect(set.get("ab".repeat(32), 3)).toBe(output);
    expect(set.has("Ab".repeat(32), 3)).toBe(true);
  });

  test("ids that only differ around a separator stay distinct", () => {
    const a = new TransactionOutput(1, fromHex("51"));
    const b = new TransactionOutput(2, fromHex("52"));
    const set = new UtxoSet().add("a#1", 2, a).add("a", 12, b);

    expect(set.get("a#1", 2)).toBe(a);
    expect(set.get("a", 12)).toBe(b);
    expect(set.get("a#12", 0)).toBeUndefined();
  });

  test("builds from transactions", () => {
    const tx = TransactionReader.readHex(ThreeOutputTxRaw);
    const set = UtxoSet.fromTransactions([tx]);

    expect(set.size).toBe(3);
    expect(set.get(ThreeOutputTxId, 2)?.Satoshis).toBe(17925);
  });
});
