import type { Logger } from "../internal/logger.ts";
import { BufferInvariantError } from "./io_errors.ts";

/**
 * Fixed-capacity byte buffer with a consume position and a watermark of
 * meaningful bytes. Shared by the buffered reader and writer.
 *
 * Invariant: `0 <= position <= end <= capacity`. Any operation that would
 * break it throws a BufferInvariantError and leaves the cursor untouched.
 * Bytes past `end` are never read.
 */
export class BufferCursor {
  #storage: Uint8Array;
  #position = 0;
  #end = 0;
  #logger: Logger | undefined;

  /**
   * Allocates the storage once; it is never resized.
   * @param capacity Buffer size in bytes.
   * @param logger Receives invariant violations before they are thrown.
   * @throws RangeError if capacity is not a positive integer
   */
  public constructor(capacity: number, logger?: Logger) {
    if (!Number.isSafeInteger(capacity) || capacity <= 0) {
      throw new RangeError(
        `Capacity must be a positive integer. Got capacity=${capacity}`,
      );
    }
    this.#storage = new Uint8Array(capacity);
    this.#logger = logger;
  }

  public capacity(): number {
    return this.#storage.length;
  }

  public position(): number {
    return this.#position;
  }

  public end(): number {
    return this.#end;
  }

  /**
   * Whether every meaningful byte has been consumed.
   */
  public isDrained(): boolean {
    return this.#position === this.#end;
  }

  /**
   * Bytes between the watermark and the end of storage.
   */
  public free(): number {
    return this.#storage.length - this.#end;
  }

  /**
   * View of the unconsumed bytes `[position, end)`.
   */
  public available(): Uint8Array {
    return this.#storage.subarray(this.#position, this.#end);
  }

  /**
   * View of every meaningful byte `[0, end)`.
   */
  public pending(): Uint8Array {
    return this.#storage.subarray(0, this.#end);
  }

  /**
   * The whole storage, for a source to fill from index 0.
   */
  public storage(): Uint8Array {
    return this.#storage;
  }

  /**
   * Advances the position past `amount` bytes.
   * @throws BufferInvariantError if that would pass the watermark
   */
  public consume(amount: number): void {
    if (!Number.isInteger(amount) || amount < 0) {
      throw this.#violation(
        `Consume amount must be a non-negative integer. Got amount=${amount}`,
      );
    }
    if (this.#position + amount > this.#end) {
      throw this.#violation(
        `Cannot consume ${amount} bytes: only ${this.#end - this.#position} available`,
      );
    }
    this.#position += amount;
  }

  /**
   * Records that storage now holds `end` fresh bytes from index 0.
   * @throws BufferInvariantError if `end` is outside the storage
   */
  public reset(end: number): void {
    if (!Number.isInteger(end) || end < 0 || end > this.#storage.length) {
      throw this.#violation(
        `Refill of ${end} bytes does not fit a buffer of ${this.#storage.length}`,
      );
    }
    this.#position = 0;
    this.#end = end;
  }

  /**
   * Copies `data` in at the watermark and raises it.
   * @throws BufferInvariantError if `data` does not fit
   */
  public append(data: Uint8Array): void {
    if (data.length > this.free()) {
      throw this.#violation(
        `Cannot append ${data.length} bytes: only ${this.free()} free`,
      );
    }
    this.#storage.set(data, this.#end);
    this.#end += data.length;
  }

  /**
   * Forgets every buffered byte.
   */
  public clear(): void {
    this.#position = 0;
    this.#end = 0;
  }

  #violation(message: string): BufferInvariantError {
    const error = new BufferInvariantError(
      message,
      this.#position,
      this.#end,
      this.#storage.length,
    );
    this.#logger?.error({ err: error }, message);
    return error;
  }
}
