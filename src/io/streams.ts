/**
 * Capability interfaces for synchronous byte sources and sinks, and the
 * buffered views layered on top of them.
 */

/**
 * Interface describing a synchronous byte source.
 * Reads may be short; end of stream is reported separately through eof().
 */
export interface ISource {
  /**
   * Reads up to `destination.length` bytes into the start of `destination`.
   * Returns the number of bytes read, or undefined when nothing could be
   * read. A result of undefined (or 0) does not by itself mean the source is
   * exhausted; query eof() for that.
   */
  read(destination: Uint8Array): number | undefined;

  /**
   * Returns true once the source can never produce another byte.
   */
  eof(): boolean;
}

/**
 * Interface describing a synchronous byte sink.
 */
export interface ISink {
  /**
   * Writes every byte of `data`, or throws. The view is only valid for the
   * duration of the call; sinks that keep the bytes must copy them.
   */
  write(data: Uint8Array): void;

  /**
   * Forces delivery of anything the sink holds back.
   */
  flush(): void;
}

/**
 * An object that is both a source and a sink, such as a socket.
 */
export type IDuplex = ISource & ISink;

/**
 * A source with an internal buffer that callers can inspect in place.
 */
export interface IBufferedSource extends ISource {
  /**
   * Returns the unread bytes currently buffered, refilling from the wrapped
   * source once if the buffer is exhausted. An empty result means end of
   * stream. The view is invalidated by the next fill.
   */
  fill(): Uint8Array;

  /**
   * Marks `amount` bytes of the last fill() result as consumed.
   */
  consume(amount: number): void;

  /**
   * Reads through and including the next `byte`, or to end of stream.
   * Returns undefined if no bytes remained.
   */
  readUntil(byte: number): Uint8Array | undefined;

  /**
   * Reads a single byte, or returns undefined at end of stream.
   */
  readByte(): number | undefined;
}

/**
 * A wrapper that owns another I/O object.
 */
export interface IDecorator<T> {
  /**
   * Hands back the wrapped object. Decorators that buffer output write their
   * pending bytes first; the decorator must not be used afterwards.
   */
  inner(): T;

  /**
   * Returns the wrapped object without performing any I/O.
   */
  innerRef(): T;
}
