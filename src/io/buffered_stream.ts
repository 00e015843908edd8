import { createLogger, type Logger } from "../internal/logger.ts";
import { BufferedReader } from "./buffered_reader.ts";
import { BufferedWriter } from "./buffered_writer.ts";
import { DEFAULT_CAPACITY } from "./constants.ts";
import type {
  IBufferedSource,
  IDecorator,
  IDuplex,
  ISink,
  ISource,
} from "./streams.ts";

const defaultLogger = createLogger("buffered-stream");

/**
 * Options for {@link BufferedStream}.
 */
export interface BufferedStreamOptions {
  /** Input buffer size in bytes. Defaults to 64 KiB. */
  readerCapacity?: number;
  /** Output buffer size in bytes. Defaults to 64 KiB. */
  writerCapacity?: number;
  logger?: Logger;
}

/**
 * Presents a buffered writer over a duplex object as a source, so that a
 * {@link BufferedReader} can sit on top of it. Reads go straight to the duplex
 * object and never pass through the write buffer.
 */
class WriterSourceAdapter<D extends IDuplex> implements ISource {
  public readonly writer: BufferedWriter<D>;

  public constructor(writer: BufferedWriter<D>) {
    this.writer = writer;
  }

  public read(destination: Uint8Array): number | undefined {
    return this.writer.innerRef().read(destination);
  }

  public eof(): boolean {
    return this.writer.innerRef().eof();
  }
}

/**
 * Wraps an {@link IDuplex} and buffers input from it and output to it
 * independently.
 *
 * Reading never flushes pending output. Like {@link BufferedWriter}, the
 * output buffer is NOT flushed when the stream is dropped.
 *
 * @example
 * ```typescript
 * const stream = new BufferedStream(socket);
 * stream.write(request);
 * stream.flush();
 * const line = stream.readUntil(0x0a);
 * ```
 */
export class BufferedStream<D extends IDuplex>
  implements IBufferedSource, ISink, IDecorator<D> {
  #reader: BufferedReader<WriterSourceAdapter<D>>;

  public constructor(duplex: D, options: BufferedStreamOptions = {}) {
    const logger = options.logger ?? defaultLogger;
    const writer = new BufferedWriter(duplex, {
      capacity: options.writerCapacity ?? DEFAULT_CAPACITY,
      logger,
    });
    this.#reader = new BufferedReader(new WriterSourceAdapter(writer), {
      capacity: options.readerCapacity ?? DEFAULT_CAPACITY,
      logger,
    });
  }

  public fill(): Uint8Array {
    return this.#reader.fill();
  }

  public consume(amount: number): void {
    this.#reader.consume(amount);
  }

  public read(destination: Uint8Array): number | undefined {
    return this.#reader.read(destination);
  }

  public eof(): boolean {
    return this.#reader.eof();
  }

  public readUntil(byte: number): Uint8Array | undefined {
    return this.#reader.readUntil(byte);
  }

  public readByte(): number | undefined {
    return this.#reader.readByte();
  }

  public write(data: Uint8Array): void {
    this.#writer().write(data);
  }

  public flush(): void {
    this.#writer().flush();
  }

  /**
   * Number of output bytes not yet handed to the duplex object.
   */
  public pending(): number {
    return this.#writer().pending();
  }

  /**
   * Number of input bytes buffered but not yet consumed.
   */
  public buffered(): number {
    return this.#reader.buffered();
  }

  /**
   * Writes pending output and returns the duplex object. Buffered input is
   * discarded.
   */
  public inner(): D {
    return this.#writer().inner();
  }

  public innerRef(): D {
    return this.#writer().innerRef();
  }

  #writer(): BufferedWriter<D> {
    return this.#reader.innerRef().writer;
  }
}
