import { createLogger, type Logger } from "../internal/logger.ts";
import { BufferedWriter } from "./buffered_writer.ts";
import { LINE_BUFFER_CAPACITY, NEWLINE } from "./constants.ts";
import type { IDecorator, ISink } from "./streams.ts";

const defaultLogger = createLogger("line-buffered-writer");

/**
 * Options for {@link LineBufferedWriter}.
 */
export interface LineBufferedWriterOptions {
  /** Buffer size in bytes. Defaults to 1 KiB. */
  capacity?: number;
  logger?: Logger;
}

/**
 * Wraps an {@link ISink} and buffers output to it, flushing whenever a
 * newline (0x0a) is written.
 *
 * Like {@link BufferedWriter}, this does NOT flush when dropped: bytes after
 * the last newline stay buffered until the next newline, flush() or inner().
 */
export class LineBufferedWriter<W extends ISink>
  implements ISink, IDecorator<W> {
  #writer: BufferedWriter<W>;

  public constructor(sink: W, options: LineBufferedWriterOptions = {}) {
    this.#writer = new BufferedWriter(sink, {
      capacity: options.capacity ?? LINE_BUFFER_CAPACITY,
      logger: options.logger ?? defaultLogger,
    });
  }

  /**
   * Writes `data`; everything up to and including its last newline reaches
   * the sink before this returns.
   */
  public write(data: Uint8Array): void {
    const index = data.lastIndexOf(NEWLINE);
    if (index === -1) {
      this.#writer.write(data);
      return;
    }
    this.#writer.write(data.subarray(0, index + 1));
    this.#writer.flush();
    this.#writer.write(data.subarray(index + 1));
  }

  public flush(): void {
    this.#writer.flush();
  }

  /**
   * Number of bytes after the last newline still waiting in the buffer.
   */
  public pending(): number {
    return this.#writer.pending();
  }

  public inner(): W {
    return this.#writer.inner();
  }

  public innerRef(): W {
    return this.#writer.innerRef();
  }
}
