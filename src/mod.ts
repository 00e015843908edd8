// Capability interfaces
export type {
  IBufferedSource,
  IDecorator,
  IDuplex,
  ISink,
  ISource,
} from "./io/streams.ts";

// Buffering decorators
export {
  BufferedReader,
  type BufferedReaderOptions,
} from "./io/buffered_reader.ts";
export {
  BufferedWriter,
  type BufferedWriterOptions,
} from "./io/buffered_writer.ts";
export {
  LineBufferedWriter,
  type LineBufferedWriterOptions,
} from "./io/line_buffered_writer.ts";
export {
  BufferedStream,
  type BufferedStreamOptions,
} from "./io/buffered_stream.ts";
export { BufferCursor } from "./io/buffer_cursor.ts";
export { readByte, readUntil } from "./io/buffer_helpers.ts";
export {
  DEFAULT_CAPACITY,
  LINE_BUFFER_CAPACITY,
  NEWLINE,
} from "./io/constants.ts";

// Errors
export { BufferInvariantError } from "./io/io_errors.ts";

// In-memory collaborators
export { MemReader } from "./io/mem/mem_reader.ts";
export { MemWriter } from "./io/mem/mem_writer.ts";
export { NullStream } from "./io/mem/null_stream.ts";

// Logging
export { createLogger, type Logger } from "./internal/logger.ts";
