import { OpCode } from "../../bitcoin/op-codes";
import { Bytes, concat, equal } from "../../bytes";

export type ScriptChunk = {
  opcode: number;
  start: number;
  end: number;
};

export class ScriptReader {
  /**
   * Splits a script into raw chunks (an opcode plus any pushed bytes).
   * A truncated trailing push is returned as a single chunk up to the end.
   */
  static chunks = (source: Bytes): ScriptChunk[] => {
    const result: ScriptChunk[] = [];

    let i = 0;

    while (i < source.length) {
      const byte = source[i];

      // data chunk
      if (byte > OpCode.OP_0 && byte <= OpCode.OP_PUSHDATA4) {
        const d = ScriptReader.decode(source, i);
        const end =
          d === null
            ? source.length
            : Math.min(i + d.size + d.number, source.length);

        result.push({ opcode: byte, start: i, end });
        i = end;
        // opcode
      } else {
        result.push({ opcode: byte, start: i, end: i + 1 });
        i += 1;
      }
    }

    return result;
  };

  static decode = (buffer: Bytes, offset: number) => {
    const opcode = buffer[offset];
    let num;
    let size;
    // ~6 bit
    if (opcode < OpCode.OP_PUSHDATA1) {
      num = opcode;
      size = 1;
      // 8 bit
    } else if (opcode === OpCode.OP_PUSHDATA1) {
      if (offset + 2 > buffer.length) return null;
      num = buffer[offset + 1];
      size = 2;
      // 16 bit
    } else if (opcode === OpCode.OP_PUSHDATA2) {
      if (offset + 3 > buffer.length) return null;
      num = buffer[offset + 1] | (buffer[offset + 2] << 8);
      size = 3;
      // 32 bit
    } else {
      if (offset + 5 > buffer.length) return null;
      if (opcode !== OpCode.OP_PUSHDATA4) throw new Error("Unexpected opcode");
      num =
        (buffer[offset + 1] |
          (buffer[offset + 2] << 8) |
          (buffer[offset + 3] << 16) |
          (buffer[offset + 4] << 24)) >>>
        0;
      size = 5;
    }
    return {
      opcode,
      number: num,
      size,
    };
  };

  /** Smallest push encoding of `data`. */
  static encodePush = (data: Bytes): Bytes => {
    const len = data.length;

    if (len < OpCode.OP_PUSHDATA1) return concat([new Uint8Array([len]), data]);
    if (len <= 0xff)
      return concat([new Uint8Array([OpCode.OP_PUSHDATA1, len]), data]);
    if (len <= 0xffff)
      return concat([
        new Uint8Array([OpCode.OP_PUSHDATA2, len & 0xff, len >> 8]),
        data,
      ]);

    return concat([
      new Uint8Array([
        OpCode.OP_PUSHDATA4,
        len & 0xff,
        (len >> 8) & 0xff,
        (len >> 16) & 0xff,
        (len >>> 24) & 0xff,
      ]),
      data,
    ]);
  };

  /** Drops every chunk that pushes exactly `data`. */
  static removeDataPush = (source: Bytes, data: Bytes): Bytes => {
    if (data.length === 0) return source;

    const push = ScriptReader.encodePush(data);
    const kept = ScriptReader.chunks(source)
      .map((chunk) => source.subarray(chunk.start, chunk.end))
      .filter((raw) => !equal(raw, push));

    return concat(kept);
  };
}
