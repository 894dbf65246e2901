import { Bytes, fromHex } from "../bytes";
import { bs58check, hash160 } from "../hashes";
import { Network, Networks } from "./network";

/** Pay-to-public-key-hash address in Base58Check form. */
export class Address {
  Value: string;
  Hash160: Bytes;
  Network: Network;

  constructor(hash160: Bytes, network: Network = Networks.Mainnet) {
    if (hash160.length !== 20) throw new Error("Invalid hash160");

    const buffer = new Uint8Array(21);

    buffer[0] = network.pubKeyHash;
    buffer.set(hash160, 1);

    this.Value = bs58check.encode(buffer);
    this.Hash160 = hash160;
    this.Network = network;
  }

  static fromBase58 = (address: string, network: Network = Networks.Mainnet) => {
    const buffer = bs58check.decode(address);

    if (buffer.length !== 21) throw new Error("Invalid address length");
    if (buffer[0] !== network.pubKeyHash)
      throw new Error(`Address does not belong to ${network.name}`);

    return new Address(buffer.slice(1), network);
  };

  static fromHash160 = (hash160: Bytes, network?: Network) =>
    new Address(hash160, network);

  /** Accepts both compressed (33 bytes) and uncompressed (65 bytes) keys. */
  static fromPublicKey = (publicKey: Bytes, network?: Network) =>
    new Address(hash160(publicKey), network);

  static fromHash160Hex = (hash160: string, network?: Network) =>
    new Address(fromHex(hash160), network);

  toString = () => this.Value;
}
