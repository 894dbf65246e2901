import { SignatureHashType } from "../src/bitcoin/sig-hash-type";
import { Transaction } from "../src/bitcoin/transaction";
import { TransactionInput } from "../src/bitcoin/transaction-input";
import { TransactionOutput } from "../src/bitcoin/transaction-output";
import { fromHex, toHex } from "../src/bytes";
import { legacySignatureHash } from "../src/script/eval/sighash";

const scriptCode = fromHex("51");

describe("legacy signature hash", () => {
  const twoByTwo = Transaction.fromParts(
    [
      new TransactionInput("11".repeat(32), 0, fromHex("aabb")),
      new TransactionInput("22".repeat(32), 3, fromHex("ccdd")),
    ],
    [
      new TransactionOutput(1000, fromHex("51")),
      new TransactionOutput(2000, fromHex("52")),
    ],
  );

  test("SIGHASH_ALL over a single input", () => {
    const tx = Transaction.fromParts(
      [new TransactionInput("11".repeat(32), 0, fromHex("00"))],
      [new TransactionOutput(1000, fromHex("51"))],
    );

    expect(
      toHex(legacySignatureHash(tx, 0, scriptCode, SignatureHashType.SIGHASH_ALL)),
    ).toBe("b5dbf95b731a8f5a5db7ddc1fc100ad4d625f63a843ef15c791dcbf577ed63b4");
  });

  test.each([
    [0x01, "886365d85b539dc1ce9d680a90d0074641db6eadb5ae8e42730743703d425c85"],
    [0x02, "e37c86ee58d5016fd544a3495db06f013239520541838b9cd0e536e5127b1c85"],
    [0x03, "f24113e23eb27adb64335d10acb7012deca4b34c8cc6428feb330733538d9328"],
    [0x81, "535b43413549fd401fb81c3a042e25623d40d36932f94c9e5ef567397cfae126"],
    [0x83, "6dad395a38066f6eab7a9af04f4e44deb8a4d38758e683c8db1500b033b839e2"],
  ])("hash type %i of the second input", (hashType, expected) => {
    expect(toHex(legacySignatureHash(twoByTwo, 1, scriptCode, hashType))).toBe(
      expected,
    );
  });

  test("input scripts of the transaction do not affect the hash", () => {
    const blank = Transaction.fromParts(
      twoByTwo.Inputs.map(
        (input) => new TransactionInput(input.TxId, input.Vout),
      ),
      twoByTwo.Outputs,
    );

    expect(toHex(legacySignatureHash(blank, 1, scriptCode, 0x01))).toBe(
      toHex(legacySignatureHash(twoByTwo, 1, scriptCode, 0x01)),
    );
  });

  test("SIGHASH_SINGLE without a matching output hashes to one", () => {
    const tx = Transaction.fromParts(twoByTwo.Inputs, [twoByTwo.Outputs[0]]);

    expect(
      toHex(
        legacySignatureHash(tx, 1, scriptCode, SignatureHashType.SIGHASH_SINGLE),
      ),
    ).toBe("01" + "00".repeat(31));
  });

  test("rejects an input index outside the transaction", () => {
    expect(() => legacySignatureHash(twoByTwo, 2, scriptCode, 0x01)).toThrow(
      "Input index out of range",
    );
    expect(() => legacySignatureHash(twoByTwo, -1, scriptCode, 0x01)).toThrow(
      "Input index out of range",
    );
  });
});
