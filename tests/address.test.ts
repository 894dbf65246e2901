import { Address } from "../src/bitcoin/address";
import { Networks } from "../src/bitcoin/network";
import { fromHex, toHex } from "../src/bytes";

describe("address", () => {
  test("address construction from hash160", () => {
    const address = Address.fromHash160Hex(
      "e3b111de8fec527b41f4189e313638075d96ccd6",
    );

    expect(address.Value).toBe("1MkvWa82XHFqmRHaiRZ8BqZS7Uc83wekjp");
    expect(address.toString()).toBe("1MkvWa82XHFqmRHaiRZ8BqZS7Uc83wekjp");
    expect(Address.fromBase58(address.Value).Hash160.length).toBe(20);
  });

  test("base58 decoding returns the same hash160", () => {
    const address = Address.fromBase58("1GZQKjsC97yasxRj1wtYf5rC61AxpR1zmr");

    expect(toHex(address.Hash160)).toBe("aa".repeat(20));
  });

  test("uncompressed public key is hashed before encoding", () => {
    const publicKey = new Uint8Array(65).fill(0x11);
    publicKey[0] = 0x04;

    const address = Address.fromPublicKey(publicKey);

    expect(toHex(address.Hash160)).toBe(
      "57381bc2c3a6ba7dbfd0f34f4ac111bc0b7a747e",
    );
    expect(address.Value).toBe("18xB1Aym9saGzxfuCZuLJhQd53juUF1RFn");
  });

  test("testnet uses its own version byte", () => {
    const address = Address.fromHash160(
      new Uint8Array(20).fill(0xaa),
      Networks.Testnet,
    );

    expect(address.Value).toBe("mw5McnxAx9Qqf4uLjWrvV14WwzmfgiQ9PX");
    expect(() => Address.fromBase58(address.Value)).toThrow(
      "Address does not belong to mainnet",
    );
    expect(Address.fromBase58(address.Value, Networks.Testnet).Value).toBe(
      address.Value,
    );
  });

  test("rejects hash160 of the wrong size", () => {
    expect(() => new Address(fromHex("0102"))).toThrow("Invalid hash160");
  });
});
