import { Bytes } from "../bytes";

export const ensureUInt = (value: number, max: number) => {
  if (value < 0)
    throw new Error("specified a negative value for writing an unsigned value");

  if (value > max) throw new Error("RangeError: value out of range");

  if (Math.floor(value) !== value)
    throw new Error(`value has a fractional component: ${value}`);
};

/** Returns a reversed copy; the source is left untouched. */
export const reverseBytes = (source: Bytes): Bytes => {
  const out = new Uint8Array(source.length);
  for (let i = 0; i < source.length; i++) {
    out[i] = source[source.length - 1 - i];
  }
  return out;
};

export const cloneBytes = (source: Bytes): Bytes => Uint8Array.from(source);

export const getVarIntLength = (value: number): number =>
  value < 0xfd ? 1 : value <= 0xffff ? 3 : value <= 0xffffffff ? 5 : 9;

export const estimateChunkSize = (bufferSize: number) =>
  getVarIntLength(bufferSize) + bufferSize;
