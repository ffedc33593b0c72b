/**
 * Log levels understood by renderers
 */
export type LogLevel = 'info' | 'success' | 'warn' | 'error';

/**
 * Frame markers. A frame groups the messages of one round or summary.
 */
export type LogFrame = { kind: 'open' } | { kind: 'close'; elapsedMs: number };

/**
 * A single progress message
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  depth: number;
  frame?: LogFrame;
}

/**
 * Logger capability passed down through runs
 */
export interface Logger {
  log(entry: LogEntry): void;
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  log: () => undefined,
};

/**
 * Logger that keeps every entry, for inspection
 */
export interface MemoryLogger extends Logger {
  readonly entries: LogEntry[];
  messages(): string[];
}

export function createMemoryLogger(): MemoryLogger {
  const entries: LogEntry[] = [];
  return {
    entries,
    log(entry) {
      entries.push(entry);
    },
    messages() {
      return entries.filter((entry) => entry.frame === undefined).map((entry) => entry.message);
    },
  };
}

/**
 * Convenience wrapper binding a logger to one nesting depth
 */
export interface ScopedLogger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function scopeLogger(logger: Logger, depth: number): ScopedLogger {
  const at = (level: LogLevel) => (message: string) => logger.log({ level, message, depth });
  return {
    info: at('info'),
    success: at('success'),
    warn: at('warn'),
    error: at('error'),
  };
}

/**
 * Run `body` inside a titled frame. Messages logged by the body sit one level deeper.
 */
export function withFrame<T>(logger: Logger, title: string, depth: number, body: (frame: ScopedLogger) => T): T {
  const startedAt = Date.now();
  logger.log({ level: 'info', message: title, depth, frame: { kind: 'open' } });
  try {
    return body(scopeLogger(logger, depth + 1));
  } finally {
    logger.log({
      level: 'info',
      message: title,
      depth,
      frame: { kind: 'close', elapsedMs: Date.now() - startedAt },
    });
  }
}
