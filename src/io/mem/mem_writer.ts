import type { ISink } from "../streams.ts";

/**
 * Synchronous sink that appends everything written to a growable in-memory
 * array. Also counts write and flush calls, which is what buffering tests
 * care about.
 */
export class MemWriter implements ISink {
  #buffer: Uint8Array;
  #count = 0;
  #writes = 0;
  #flushes = 0;

  /**
   * @param initialSize Starting allocation in bytes; doubles as needed.
   */
  public constructor(initialSize = 1024) {
    this.#buffer = new Uint8Array(Math.max(1, initialSize));
  }

  public write(data: Uint8Array): void {
    this.#writes++;
    if (data.length === 0) {
      return;
    }
    this.#ensureCapacity(this.#count + data.length);
    this.#buffer.set(data, this.#count);
    this.#count += data.length;
  }

  public flush(): void {
    this.#flushes++;
  }

  /**
   * Returns a copy of every byte written so far.
   */
  public toUint8Array(): Uint8Array {
    return this.#buffer.slice(0, this.#count);
  }

  public length(): number {
    return this.#count;
  }

  /** Number of write() calls received, including empty ones. */
  public writeCount(): number {
    return this.#writes;
  }

  /** Number of flush() calls received. */
  public flushCount(): number {
    return this.#flushes;
  }

  #ensureCapacity(minCapacity: number): void {
    if (minCapacity <= this.#buffer.length) {
      return;
    }
    let newCapacity = this.#buffer.length * 2;
    if (newCapacity < minCapacity) {
      newCapacity = minCapacity;
    }
    const newBuffer = new Uint8Array(newCapacity);
    newBuffer.set(this.#buffer.subarray(0, this.#count));
    this.#buffer = newBuffer;
  }
}
