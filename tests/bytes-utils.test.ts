import { ByteReader, ByteWriter } from "../src/binary";
import { concat, equal, fromHex, toHex } from "../src/bytes";

describe("bytes utilities", () => {
  test("hex round-trip and odd length", () => {
    const hex = "deadbeef";
    const bytes = fromHex(hex);

    expect(toHex(bytes)).toBe(hex);

    const odd = fromHex("abc");
    expect(toHex(odd)).toBe("0abc");
  });

  test("concat and equal", () => {
    const a = fromHex("01ff");
    const b = fromHex("0203");
    const merged = concat([a, b]);

    expect(toHex(merged)).toBe("01ff0203");
    expect(equal(merged, fromHex("01ff0203"))).toBe(true);
    expect(equal(merged, a)).toBe(false);
  });

  test("fromHex rejects invalid input", () => {
    expect(() => fromHex("zz")).toThrow("Invalid hex string");
  });
});

describe("byte reader and writer", () => {
  test("reader tracks remaining bytes and end of stream", () => {
    const reader = new ByteReader(fromHex("0102030405"));

    expect(reader.readUInt8()).toBe(1);
    expect(reader.remaining).toBe(4);
    expect(toHex(reader.readChunk(3))).toBe("020304");
    expect(reader.eof).toBe(false);
    expect(reader.readUInt8()).toBe(5);
    expect(reader.eof).toBe(true);
  });

  test("reader refuses chunks past the end", () => {
    const reader = new ByteReader(fromHex("0102"));

    expect(() => reader.readChunk(3)).toThrow("Cannot read chunk out of bounds");
    expect(reader.offset).toBe(0);
  });

  test("writer and reader agree on little-endian integers", () => {
    const writer = ByteWriter.fromSize(4 + 8 + 3 + 2);

    writer.writeUInt32(0xffffffff);
    writer.writeUInt64(5000000000);
    writer.writeVarInt(300);
    writer.writeVarChunk(fromHex("ab"));

    expect(toHex(writer.buffer)).toBe("ffffffff00f2052a01000000fd2c0101ab");

    const reader = new ByteReader(writer.buffer);
    expect(reader.readUInt32()).toBe(0xffffffff);
    expect(reader.readUInt64()).toBe(5000000000);
    expect(reader.readVarInt()).toBe(300);
    expect(toHex(reader.readVarChunk())).toBe("ab");
    expect(reader.eof).toBe(true);
  });
});
