import { createLogger, type Logger } from "../internal/logger.ts";
import { BufferCursor } from "./buffer_cursor.ts";
import { readByte, readUntil } from "./buffer_helpers.ts";
import { DEFAULT_CAPACITY } from "./constants.ts";
import type { IBufferedSource, IDecorator, ISource } from "./streams.ts";

const defaultLogger = createLogger("buffered-reader");

/**
 * Options for {@link BufferedReader}.
 */
export interface BufferedReaderOptions {
  /** Buffer size in bytes. Defaults to 64 KiB. */
  capacity?: number;
  /** Logger for refill tracing. Defaults to the library's component logger. */
  logger?: Logger;
}

/**
 * Wraps an {@link ISource} and buffers input from it.
 *
 * The buffer is refilled with a single source read, and only once every
 * buffered byte has been consumed. read() is a short read: it never goes back
 * to the source to top up a partially served destination.
 *
 * @example
 * ```typescript
 * const reader = new BufferedReader(new MemReader(bytes), { capacity: 4096 });
 * const chunk = new Uint8Array(100);
 * const count = reader.read(chunk);
 * if (count === undefined) {
 *   // end of stream
 * }
 * ```
 */
export class BufferedReader<S extends ISource>
  implements IBufferedSource, IDecorator<S> {
  #source: S;
  #cursor: BufferCursor;
  #logger: Logger;

  /**
   * @param source The source to read from; the reader takes it over.
   * @param options Buffer capacity and logger.
   */
  public constructor(source: S, options: BufferedReaderOptions = {}) {
    this.#source = source;
    this.#logger = options.logger ?? defaultLogger;
    this.#cursor = new BufferCursor(
      options.capacity ?? DEFAULT_CAPACITY,
      this.#logger,
    );
  }

  /**
   * Size of the internal buffer in bytes.
   */
  public capacity(): number {
    return this.#cursor.capacity();
  }

  /**
   * Number of bytes buffered but not yet consumed. Performs no I/O.
   */
  public buffered(): number {
    return this.#cursor.end() - this.#cursor.position();
  }

  public fill(): Uint8Array {
    if (this.#cursor.isDrained()) {
      this.#refill();
    }
    return this.#cursor.available();
  }

  public consume(amount: number): void {
    this.#cursor.consume(amount);
  }

  /**
   * Copies up to `destination.length` buffered bytes, refilling first only
   * when the buffer is empty.
   *
   * @returns The number of bytes copied, or undefined at end of stream.
   */
  public read(destination: Uint8Array): number | undefined {
    const available = this.fill();
    if (available.length === 0) {
      return undefined;
    }
    const count = Math.min(available.length, destination.length);
    destination.set(available.subarray(0, count));
    this.#cursor.consume(count);
    return count;
  }

  /**
   * True only when the buffer is drained and the source itself is exhausted.
   */
  public eof(): boolean {
    return this.#cursor.isDrained() && this.#source.eof();
  }

  public readUntil(byte: number): Uint8Array | undefined {
    return readUntil(this, byte);
  }

  public readByte(): number | undefined {
    return readByte(this);
  }

  /**
   * Returns the source. Any bytes still buffered are discarded.
   */
  public inner(): S {
    return this.#source;
  }

  public innerRef(): S {
    return this.#source;
  }

  #refill(): void {
    const storage = this.#cursor.storage();
    const count = this.#source.read(storage);
    if (count === undefined) {
      // Position and watermark stay put; fill() reports an empty view.
      this.#logger.debug(
        { requested: storage.length },
        "source returned no data",
      );
      return;
    }
    this.#cursor.reset(count);
    this.#logger.debug(
      { requested: storage.length, received: count },
      "refilled read buffer",
    );
  }
}
