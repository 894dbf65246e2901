/** Operation-level failure; collapses to a `false` verdict, never escapes execution. */
export class ScriptEvalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScriptEvalError";
  }
}

export type ScriptParseErrorCode = "UNSUPPORTED_OPCODE" | "TRUNCATED_PUSH";

/** Script bytes that cannot be decoded into a program at all. */
export class ScriptParseError extends Error {
  readonly code: ScriptParseErrorCode;
  readonly offset: number;
  readonly opcode: number;

  constructor(
    code: ScriptParseErrorCode,
    message: string,
    offset: number,
    opcode: number,
  ) {
    super(message);
    this.name = "ScriptParseError";
    this.code = code;
    this.offset = offset;
    this.opcode = opcode;
  }

  static unsupportedOpcode = (opcode: number, offset: number) =>
    new ScriptParseError(
      "UNSUPPORTED_OPCODE",
      `Unsupported opcode: 0x${opcode.toString(16).padStart(2, "0")} at offset ${offset}`,
      offset,
      opcode,
    );

  static truncatedPush = (opcode: number, offset: number, available: number) =>
    new ScriptParseError(
      "TRUNCATED_PUSH",
      `Push of ${opcode} bytes at offset ${offset} exceeds script length (${available} available)`,
      offset,
      opcode,
    );
}
