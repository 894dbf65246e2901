import { Bytes } from "../bytes";

export class TransactionOutput {
  Satoshis: number;
  LockingScript: Bytes;

  constructor(satoshis: number, lockingScript: Bytes) {
    this.Satoshis = satoshis;
    this.LockingScript = lockingScript;
  }
}
