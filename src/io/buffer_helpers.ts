import type { IBufferedSource } from "./streams.ts";

/**
 * Reads from `source` through and including the next occurrence of `byte`.
 *
 * Each fill() result is scanned once; bytes before the delimiter are copied
 * out and consumed, so a record may span any number of refills. At end of
 * stream whatever was gathered is returned without a delimiter.
 *
 * @returns The record, or undefined if the source had no bytes left.
 * @throws RangeError if byte is not in 0..255
 */
export function readUntil(
  source: IBufferedSource,
  byte: number,
): Uint8Array | undefined {
  if (!Number.isInteger(byte) || byte < 0 || byte > 0xff) {
    throw new RangeError(`Delimiter must be a byte value. Got byte=${byte}`);
  }

  const chunks: Uint8Array[] = [];
  let total = 0;
  for (;;) {
    const available = source.fill();
    if (available.length === 0) {
      break;
    }
    const index = available.indexOf(byte);
    const used = index === -1 ? available.length : index + 1;
    // fill() views are overwritten by the next refill
    chunks.push(available.slice(0, used));
    total += used;
    source.consume(used);
    if (index !== -1) {
      break;
    }
  }

  if (total === 0) {
    return undefined;
  }
  if (chunks.length === 1) {
    return chunks[0];
  }
  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

/**
 * Reads one byte from `source`, or returns undefined at end of stream.
 */
export function readByte(source: IBufferedSource): number | undefined {
  const available = source.fill();
  if (available.length === 0) {
    return undefined;
  }
  const value = available[0];
  source.consume(1);
  return value;
}
