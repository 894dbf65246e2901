import { Bytes, EMPTY_BYTES } from "../bytes";

export class TransactionInput {
  static DefaultSequence = 0xffffffff;

  TxId: string;
  Vout: number;
  UnlockingScript: Bytes;
  Sequence: number;

  constructor(
    txId: string,
    vout: number,
    unlockingScript: Bytes = EMPTY_BYTES,
    sequence: number = TransactionInput.DefaultSequence
  ) {
    this.TxId = txId;
    this.Vout = vout;
    this.UnlockingScript = unlockingScript;
    this.Sequence = sequence;
  }

  toString = () => `${this.TxId}:${this.Vout}`;
}
