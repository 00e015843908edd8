/**
 * Error classes for the buffering decorators.
 *
 * End of stream is never reported through these: it is a plain `undefined`
 * result from `read`, `readUntil` and `readByte`.
 */

/**
 * Error thrown when a buffer cursor would leave the
 * `0 <= position <= end <= capacity` window. This is a programming error in
 * the caller or in a wrapped source, not a recoverable condition.
 */
export class BufferInvariantError extends Error {
  /** The consume position at the time of the violation. */
  public readonly position: number;
  /** The watermark of meaningful bytes at the time of the violation. */
  public readonly end: number;
  /** The fixed capacity of the buffer. */
  public readonly capacity: number;

  /**
   * Creates a new BufferInvariantError.
   * @param message The error message.
   * @param position The cursor position.
   * @param end The cursor watermark.
   * @param capacity The buffer capacity.
   */
  constructor(
    message: string,
    position: number,
    end: number,
    capacity: number,
  ) {
    super(message);
    this.name = "BufferInvariantError";
    this.position = position;
    this.end = end;
    this.capacity = capacity;
  }
}
