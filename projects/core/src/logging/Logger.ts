/**
 * Lightweight leveled logging.
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.info('Model loaded', { source: 'english-ewt.udpipe' });
 */

export type LogLevel = "silent" | "errors" | "warnings" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = [
  "silent",
  "errors",
  "warnings",
  "info",
  "debug",
];

export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

const LOG_LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Formats a message with its context appended as JSON.
 */
export function formatMessage(
  message: string,
  context?: Record<string, unknown>
): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  try {
    return `${message} ${JSON.stringify(context)}`;
  } catch {
    return `${message} [context serialization failed]`;
  }
}

/**
 * Console-based logger. Methods below the threshold are no-ops.
 */
export class ConsoleLogger implements Logger {
  private readonly priority: number;

  constructor(
    readonly level: LogLevel = "warnings",
    private readonly prefix = "udpipe"
  ) {
    this.priority = LOG_LEVEL_PRIORITY[level];
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this.priority < LOG_LEVEL_PRIORITY.errors) return;
    console.error(formatMessage(`[${this.prefix}] [ERROR] ${message}`, context));
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.priority < LOG_LEVEL_PRIORITY.warnings) return;
    console.warn(formatMessage(`[${this.prefix}] [WARN] ${message}`, context));
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.priority < LOG_LEVEL_PRIORITY.info) return;
    console.info(formatMessage(`[${this.prefix}] [INFO] ${message}`, context));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.priority < LOG_LEVEL_PRIORITY.debug) return;
    console.debug(formatMessage(`[${this.prefix}] [DEBUG] ${message}`, context));
  }
}

export function createLogger(level: LogLevel): Logger {
  return new ConsoleLogger(level);
}
