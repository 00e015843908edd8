import pino from "pino";
import type { Logger, LoggerOptions } from "pino";

const LOG_LEVEL = process.env.BUFFERED_IO_LOG_LEVEL ?? "silent";

const baseConfig: LoggerOptions = {
  level: LOG_LEVEL,
  base: {
    pid: process.pid,
    library: "buffered-io",
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
};

/** Shared root logger. Silent unless BUFFERED_IO_LOG_LEVEL says otherwise. */
export const logger: Logger = pino(baseConfig);

/**
 * Creates a child logger tagged with the given component name.
 */
export const createLogger = (
  component: string,
  context?: Record<string, unknown>,
): Logger => {
  return logger.child({ component, ...context });
};

export type { Logger };
