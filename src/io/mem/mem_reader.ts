import type { ISource } from "../streams.ts";

/**
 * Synchronous source backed by a Uint8Array.
 * Bytes are delivered sequentially, at most `chunkSize` per read, until the
 * array is exhausted.
 */
export class MemReader implements ISource {
  #source: Uint8Array;
  #chunkSize: number;
  #offset = 0;

  /**
   * Creates a new in-memory reader.
   *
   * @param source The bytes to deliver.
   * @param chunkSize Upper bound on bytes per read, to simulate short reads.
   *   Unbounded by default.
   */
  public constructor(
    source: Uint8Array,
    chunkSize: number = Number.POSITIVE_INFINITY,
  ) {
    if (!(chunkSize > 0)) {
      throw new RangeError("chunkSize must be positive");
    }
    this.#source = source;
    this.#chunkSize = chunkSize;
  }

  /**
   * Copies the next bytes into `destination`.
   *
   * @returns The number of bytes copied, or undefined once the source is exhausted.
   */
  public read(destination: Uint8Array): number | undefined {
    if (this.#offset >= this.#source.length) {
      return undefined;
    }

    const remaining = this.#source.length - this.#offset;
    const size = Math.min(this.#chunkSize, remaining, destination.length);
    destination.set(this.#source.subarray(this.#offset, this.#offset + size));
    this.#offset += size;
    return size;
  }

  public eof(): boolean {
    return this.#offset >= this.#source.length;
  }

  /**
   * Number of bytes delivered so far.
   */
  public offset(): number {
    return this.#offset;
  }
}
