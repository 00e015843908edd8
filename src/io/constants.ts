/** Default buffer size for readers and writers (64 KiB). */
export const DEFAULT_CAPACITY = 64 * 1024;

/** Default buffer size for line-buffered writers; lines are short. */
export const LINE_BUFFER_CAPACITY = 1024;

/** The byte a line-buffered writer flushes on. */
export const NEWLINE = 0x0a;
