/**
 * Structured logging for response parsing.
 *
 * Parsers log the branch they take, decode failures and known decoding
 * limitations. Lines written by `ConsoleLogger` carry the protocol of the
 * parser that owns the logger.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

/** Levels from most to least verbose */
const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

const CONSOLE_WRITERS: Readonly<Record<LogLevel, (line: string) => void>> = {
  error: (line) => console.error(line),
  warn: (line) => console.warn(line),
  info: (line) => console.log(line),
  debug: (line) => console.debug(line),
  trace: (line) => console.debug(line),
};

export interface ConsoleLoggerOptions {
  /** Lowest level written (defaults to `info`) */
  readonly level?: LogLevel;
  /** Protocol stamped on every line */
  readonly protocol?: string;
}

/**
 * Logger writing `[time] [LEVEL] [protocol] message {context}` lines to the console.
 *
 * @example
 * ```typescript
 * const logger = new ConsoleLogger({ level: 'debug', protocol: 'ec2' });
 * logger.warn('Error response carries several errors, keeping the first', { errorCount: 2 });
 * // [2024-01-15T10:30:00.000Z] [WARN] [ec2] Error response carries ... {"errorCount":2}
 * ```
 */
export class ConsoleLogger implements Logger {
  private readonly threshold: number;
  private readonly tag: string;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
    this.tag = options.protocol === undefined ? '' : `[${options.protocol}] `;
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.write('trace', message, context);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVELS.indexOf(level) < this.threshold) {
      return;
    }
    const fields = context === undefined ? '' : ` ${JSON.stringify(context)}`;
    CONSOLE_WRITERS[level](
      `[${new Date().toISOString()}] [${level.toUpperCase()}] ${this.tag}${message}${fields}`
    );
  }
}

const discard = (): void => undefined;

/**
 * Logger that discards everything; the default for parsers.
 */
export const NOOP_LOGGER: Logger = Object.freeze({
  error: discard,
  warn: discard,
  info: discard,
  debug: discard,
  trace: discard,
});

/**
 * Log a response that could not be parsed.
 */
export function logParseFailure(
  logger: Logger,
  protocol: string,
  statusCode: number,
  error: Error
): void {
  logger.error('Response parsing failed', {
    protocol,
    statusCode,
    errorName: error.name,
    errorMessage: error.message,
  });
}
