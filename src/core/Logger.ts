export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const severity: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/**
 * Writes `[Tag] message` lines through the console, dropping anything below
 * the configured level.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly tag = 'Export', private readonly level: LogLevel = 'info') {}

  debug(message: string) {
    if (this.enabled('debug')) console.debug(this.format(message));
  }

  info(message: string) {
    if (this.enabled('info')) console.log(this.format(message));
  }

  warn(message: string) {
    if (this.enabled('warn')) console.warn(this.format(message));
  }

  error(message: string) {
    if (this.enabled('error')) console.error(this.format(message));
  }

  private enabled(level: LogLevel): boolean {
    return severity[level] >= severity[this.level];
  }

  private format(message: string): string {
    return `[${this.tag}] ${message}`;
  }
}
