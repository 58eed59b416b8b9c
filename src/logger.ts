export type Logger = Pick<Console, "debug" | "info" | "warn" | "error">;

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const noop = () => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

export function createLogger(level: LogLevel = "info", sink: Logger = console): Logger {
  const threshold = LEVEL_ORDER[level];
  const pass = (candidate: LogLevel) => LEVEL_ORDER[candidate] >= threshold;
  return {
    debug: pass("debug") ? sink.debug.bind(sink) : noop,
    info: pass("info") ? sink.info.bind(sink) : noop,
    warn: pass("warn") ? sink.warn.bind(sink) : noop,
    error: pass("error") ? sink.error.bind(sink) : noop,
  };
}

export function scopedLogger(logger: Logger, scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (...args: unknown[]) => logger.debug(prefix, ...args),
    info: (...args: unknown[]) => logger.info(prefix, ...args),
    warn: (...args: unknown[]) => logger.warn(prefix, ...args),
    error: (...args: unknown[]) => logger.error(prefix, ...args),
  };
}
