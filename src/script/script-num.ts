import { Bytes } from "../bytes";
import { ScriptEvalError } from "./errors";

/** Operands of numeric opcodes are limited to 4 bytes. */
export const MAX_SCRIPT_NUM_LENGTH = 4;

/** Non-empty and not all zero; a trailing 0x80 after zeros is negative zero. */
export const isTruthy = (value: Bytes): boolean => {
  for (let i = 0; i < value.length; i++) {
    if (value[i] !== 0) {
      if (i === value.length - 1 && value[i] === 0x80) return false;
      return true;
    }
  }
  return false;
};

export const decodeScriptNum = (
  value: Bytes,
  maxLength = MAX_SCRIPT_NUM_LENGTH,
): bigint => {
  if (value.length > maxLength)
    throw new ScriptEvalError("Script number overflow");
  if (value.length === 0) return BigInt(0);

  let result = BigInt(0);
  for (let i = 0; i < value.length; i++) {
    result |= BigInt(value[i]) << BigInt(8 * i);
  }

  const signBit = BigInt(1) << BigInt(8 * value.length - 1);
  if ((result & signBit) !== BigInt(0)) {
    result &= signBit - BigInt(1);
    return -result;
  }

  return result;
};

export const encodeScriptNum = (value: bigint): Bytes => {
  if (value === BigInt(0)) return new Uint8Array();

  const neg = value < BigInt(0);
  let absValue = neg ? -value : value;
  const result: number[] = [];

  while (absValue > BigInt(0)) {
    result.push(Number(absValue & BigInt(0xff)));
    absValue >>= BigInt(8);
  }

  if ((result[result.length - 1] & 0x80) !== 0) {
    result.push(neg ? 0x80 : 0x00);
  } else if (neg) {
    result[result.length - 1] |= 0x80;
  }

  return new Uint8Array(result);
};

export const encodeBool = (value: boolean): Bytes =>
  value ? new Uint8Array([1]) : new Uint8Array();
