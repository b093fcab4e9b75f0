/**
 * Logger with structured output
 *
 * Writes one JSON object per line to stdout. The threshold comes from
 * LOG_LEVEL unless given explicitly.
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

/**
 * Parse a LOG_LEVEL value, falling back to INFO
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const upper = value?.toUpperCase();
  if (upper === 'DEBUG' || upper === 'INFO' || upper === 'WARN' || upper === 'ERROR') {
    return upper;
  }
  if (upper === 'WARNING') {
    return 'WARN';
  }
  return 'INFO';
}

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  bindings?: Record<string, unknown>;
  sink?: LogSink;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly bindings: Record<string, unknown>;
  private readonly sink: LogSink;

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? parseLogLevel(process.env.LOG_LEVEL);
    this.bindings = options?.bindings ?? {};
    this.sink = options?.sink ?? ((line) => console.log(line));
  }

  /**
   * Create a logger that adds `bindings` to every entry
   */
  child(bindings: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      bindings: { ...this.bindings, ...bindings },
      sink: this.sink,
    });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('WARN', message, data);
  }

  error(message: string, error?: Error, data?: Record<string, unknown>): void {
    this.log('ERROR', message, {
      ...data,
      error: error?.message,
      stack: error?.stack,
    });
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }
    this.sink(
      JSON.stringify({
        level,
        message,
        ...this.bindings,
        ...data,
        timestamp: new Date().toISOString(),
      })
    );
  }
}

/** Discards everything; handy default for tests */
export const silentLogger = new Logger({ level: 'ERROR', sink: () => undefined });

export const logger = new Logger();
