import { OpCode } from "../src/bitcoin/op-codes";
import { fromHex, toHex } from "../src/bytes";
import { ScriptReader } from "../src/script/read/script-reader";

describe("script reader", () => {
  test("splits opcodes and pushes into chunks", () => {
    const chunks = ScriptReader.chunks(fromHex("76a902aabb88"));

    expect(chunks).toEqual([
      { opcode: OpCode.OP_DUP, start: 0, end: 1 },
      { opcode: OpCode.OP_HASH160, start: 1, end: 2 },
      { opcode: 0x02, start: 2, end: 5 },
      { opcode: OpCode.OP_EQUALVERIFY, start: 5, end: 6 },
    ]);
  });

  test("truncated push runs to the end of the script", () => {
    expect(ScriptReader.chunks(fromHex("5105aabb"))).toEqual([
      { opcode: OpCode.OP_1, start: 0, end: 1 },
      { opcode: 0x05, start: 1, end: 4 },
    ]);
    expect(ScriptReader.chunks(fromHex("4c"))).toEqual([
      { opcode: OpCode.OP_PUSHDATA1, start: 0, end: 1 },
    ]);
  });

  test("decodes push lengths", () => {
    expect(ScriptReader.decode(fromHex("4c0a"), 0)).toEqual({
      opcode: OpCode.OP_PUSHDATA1,
      number: 10,
      size: 2,
    });
    expect(ScriptReader.decode(fromHex("4d0001"), 0)).toEqual({
      opcode: OpCode.OP_PUSHDATA2,
      number: 256,
      size: 3,
    });
    expect(ScriptReader.decode(fromHex("4d00"), 0)).toBeNull();
  });

  test("encodes the smallest push", () => {
    expect(toHex(ScriptReader.encodePush(fromHex("abcd")))).toBe("02abcd");
    expect(toHex(ScriptReader.encodePush(new Uint8Array(76))).slice(0, 4)).toBe(
      "4c4c",
    );
    expect(toHex(ScriptReader.encodePush(new Uint8Array(256))).slice(0, 6)).toBe(
      "4d0001",
    );
  });

  test("removes every push of the given data", () => {
    const script = fromHex("02abcd7602abcd0302abcd");

    expect(toHex(ScriptReader.removeDataPush(script, fromHex("abcd")))).toBe(
      "760302abcd",
    );
  });

  test("removing empty data leaves the script as is", () => {
    const script = fromHex("0051");

    expect(ScriptReader.removeDataPush(script, new Uint8Array())).toBe(script);
  });
});
