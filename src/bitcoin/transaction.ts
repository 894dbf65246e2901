import { reverseBytes } from "../buffer/buffer-utils";
import { Bytes, toHex } from "../bytes";
import { hash256 } from "../hashes";
import { TransactionWriter } from "../transaction/write/transaction-writer";
import { TransactionInput } from "./transaction-input";
import { TransactionOutput } from "./transaction-output";

export class Transaction {
  Inputs: TransactionInput[];
  Outputs: TransactionOutput[];
  Version: number;
  LockTime: number;
  Raw: Bytes;
  Hex: string;
  Id: string;

  constructor(
    raw: Bytes,
    inputs: TransactionInput[],
    outputs: TransactionOutput[],
    version: number,
    lockTime: number
  ) {
    this.Inputs = inputs;
    this.Outputs = outputs;
    this.Version = version;
    this.LockTime = lockTime;

    this.Raw = raw;
    this.Hex = toHex(raw);
    this.Id = toHex(reverseBytes(hash256(raw)));
  }

  static fromParts = (
    inputs: TransactionInput[],
    outputs: TransactionOutput[],
    version = 1,
    lockTime = 0
  ) =>
    new Transaction(
      TransactionWriter.write({ inputs, outputs, version, lockTime }),
      inputs,
      outputs,
      version,
      lockTime
    );
}
