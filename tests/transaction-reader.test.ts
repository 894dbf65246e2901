import { Transaction } from "../src/bitcoin/transaction";
import { TransactionInput } from "../src/bitcoin/transaction-input";
import { TransactionOutput } from "../src/bitcoin/transaction-output";
import { fromHex, toHex } from "../src/bytes";
import { TransactionReader } from "../src/transaction/read/transaction-reader";
import { TransactionWriter } from "../src/transaction/write/transaction-writer";
import { ThreeOutputTxId, ThreeOutputTxRaw } from "./fixtures/transactions";

describe("testing transaction reader", () => {
  test("read three output transaction", () => {
    const transaction = TransactionReader.readHex(ThreeOutputTxRaw);

    expect(transaction.Id).toBe(ThreeOutputTxId);
    expect(transaction.Version).toBe(1);
    expect(transaction.LockTime).toBe(0);

    expect(transaction.Inputs.length).toBe(1);
    expect(transaction.Inputs[0].TxId).toBe(
      "bedacaaeed9eef91aa359f4e7be2c674e6f0ff150f358b7439469adbc0ccc442"
    );
    expect(transaction.Inputs[0].Vout).toBe(2);
    expect(transaction.Inputs[0].Sequence).toBe(
      TransactionInput.DefaultSequence
    );
    expect(transaction.Inputs[0].UnlockingScript.length).toBe(0x6a);

    expect(transaction.Outputs.length).toBe(3);
    expect(transaction.Outputs[0].Satoshis).toBe(2400);
    expect(toHex(transaction.Outputs[0].LockingScript)).toBe(
      "76a91444800da3829882d058f5938992b16b53e0c3cb5188ac"
    );
    expect(transaction.Outputs[1].Satoshis).toBe(0);
    expect(transaction.Outputs[1].LockingScript.length).toBe(0x39);
    expect(transaction.Outputs[2].Satoshis).toBe(17925);
  });

  test("writer reproduces the raw transaction", () => {
    const transaction = TransactionReader.readHex(ThreeOutputTxRaw);
    const raw = TransactionWriter.write({
      version: transaction.Version,
      inputs: transaction.Inputs,
      outputs: transaction.Outputs,
      lockTime: transaction.LockTime,
    });

    expect(toHex(raw)).toBe(ThreeOutputTxRaw);
    expect(
      TransactionWriter.size({
        version: transaction.Version,
        inputs: transaction.Inputs,
        outputs: transaction.Outputs,
        lockTime: transaction.LockTime,
      })
    ).toBe(ThreeOutputTxRaw.length / 2);
  });

  test("fromParts computes the same id as reading the raw bytes", () => {
    const parsed = TransactionReader.readHex(ThreeOutputTxRaw);
    const built = Transaction.fromParts(
      parsed.Inputs,
      parsed.Outputs,
      parsed.Version,
      parsed.LockTime
    );

    expect(built.Id).toBe(ThreeOutputTxId);
    expect(built.Hex).toBe(ThreeOutputTxRaw);
  });

  test("minimal transaction layout", () => {
    const tx = Transaction.fromParts(
      [new TransactionInput("11".repeat(32), 1)],
      [new TransactionOutput(1000, fromHex("51"))],
      2,
      7
    );

    expect(tx.Hex).toBe(
      "02000000" +
        "01" +
        "11".repeat(32) +
        "01000000" +
        "00" +
        "ffffffff" +
        "01" +
        "e803000000000000" +
        "0151" +
        "07000000"
    );
  });

  test("rejects trailing bytes after locktime", () => {
    expect(() => TransactionReader.readHex(`${ThreeOutputTxRaw}00`)).toThrow(
      "Unexpected trailing bytes after locktime"
    );
  });
});
