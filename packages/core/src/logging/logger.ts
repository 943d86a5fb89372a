export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Logger passed explicitly to every component that reports progress.
 * Components never reach for a global logger.
 */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  /** Same sink and level, different `[Scope]` prefix. */
  child(scope: string): Logger;
}

/**
 * ConsoleLogger - writes `[Scope] message` lines through console.
 */
export class ConsoleLogger implements Logger {
  private readonly scope: string;
  private readonly threshold: number;

  constructor(scope: string, private readonly level: LogLevel = 'info') {
    this.scope = scope;
    this.threshold = LOG_LEVELS.indexOf(level);
  }

  debug(message: string, ...details: unknown[]): void {
    if (this.enabled('debug')) {
      console.debug(this.format(message), ...details);
    }
  }

  info(message: string, ...details: unknown[]): void {
    if (this.enabled('info')) {
      console.log(this.format(message), ...details);
    }
  }

  warn(message: string, ...details: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn(this.format(message), ...details);
    }
  }

  error(message: string, ...details: unknown[]): void {
    if (this.enabled('error')) {
      console.error(this.format(message), ...details);
    }
  }

  child(scope: string): Logger {
    return new ConsoleLogger(scope, this.level);
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.threshold;
  }

  private format(message: string): string {
    return `[${this.scope}] ${message}`;
  }
}

class SilentLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): Logger {
    return this;
  }
}

/** Discards everything. Default for library callers that pass no logger. */
export const silentLogger: Logger = new SilentLogger();
