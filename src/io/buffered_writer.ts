import { createLogger, type Logger } from "../internal/logger.ts";
import { BufferCursor } from "./buffer_cursor.ts";
import { DEFAULT_CAPACITY } from "./constants.ts";
import type { IDecorator, ISink } from "./streams.ts";

const defaultLogger = createLogger("buffered-writer");

/**
 * Options for {@link BufferedWriter}.
 */
export interface BufferedWriterOptions {
  /** Buffer size in bytes. Defaults to 64 KiB. */
  capacity?: number;
  /** Logger for flush tracing. Defaults to the library's component logger. */
  logger?: Logger;
}

/**
 * Wraps an {@link ISink} and buffers output to it.
 *
 * Writes are collected until the next one would overflow the buffer, at
 * which point the buffered bytes go to the sink in one write. A single write
 * larger than the whole buffer bypasses it.
 *
 * **The buffer is NOT flushed when the writer is dropped.** Bytes still
 * pending when the last reference goes away are lost. Call {@link flush} or
 * {@link inner} before letting go of the writer.
 *
 * @example
 * ```typescript
 * const writer = new BufferedWriter(socket);
 * writer.write(new TextEncoder().encode("hello, world"));
 * writer.flush();
 * ```
 */
export class BufferedWriter<W extends ISink> implements ISink, IDecorator<W> {
  #sink: W;
  #cursor: BufferCursor;
  #logger: Logger;

  /**
   * @param sink The sink to write to; the writer takes it over.
   * @param options Buffer capacity and logger.
   */
  public constructor(sink: W, options: BufferedWriterOptions = {}) {
    this.#sink = sink;
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
   * Number of bytes written but not yet handed to the sink.
   */
  public pending(): number {
    return this.#cursor.end();
  }

  public write(data: Uint8Array): void {
    if (data.length > this.#cursor.free()) {
      this.#flushBuffer();
    }

    if (data.length > this.#cursor.capacity()) {
      this.#logger.debug({ bytes: data.length }, "writing through to sink");
      this.#sink.write(data);
    } else {
      this.#cursor.append(data);
    }
  }

  /**
   * Writes any pending bytes to the sink, then flushes the sink itself.
   */
  public flush(): void {
    this.#flushBuffer();
    this.#sink.flush();
  }

  /**
   * Writes any pending bytes to the sink and returns it. The sink's own
   * flush() is not called. This is the only operation that flushes without
   * being asked to.
   */
  public inner(): W {
    this.#flushBuffer();
    return this.#sink;
  }

  public innerRef(): W {
    return this.#sink;
  }

  #flushBuffer(): void {
    const pending = this.#cursor.pending();
    if (pending.length === 0) {
      return;
    }
    this.#logger.debug({ bytes: pending.length }, "flushing write buffer");
    this.#sink.write(pending);
    this.#cursor.clear();
  }
}
