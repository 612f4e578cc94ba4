/**
 * Console Logging
 * ===============
 *
 * Scoped console logger. Every line is prefixed with the component and
 * instance it came from, e.g. `[Session session_1a2b3c4d] attempt 1: valid`.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

/**
 * Where formatted lines end up. Defaults to the console.
 */
export interface LogSink {
  error(line: string): void;
  warn(line: string): void;
  log(line: string): void;
}

export interface Logger {
  readonly scope: string;
  readonly level: LogLevel;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
  /**
   * Logger for a nested component sharing this level and sink.
   */
  child(scope: string): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((entry) => entry === value);
}

class ScopedLogger implements Logger {
  constructor(
    readonly scope: string,
    readonly level: LogLevel,
    private readonly sink: LogSink
  ) {}

  error(message: string): void {
    if (this.enabled('error')) this.sink.error(this.format(message));
  }

  warn(message: string): void {
    if (this.enabled('warn')) this.sink.warn(this.format(message));
  }

  info(message: string): void {
    if (this.enabled('info')) this.sink.log(this.format(message));
  }

  debug(message: string): void {
    if (this.enabled('debug')) this.sink.log(this.format(message));
  }

  child(scope: string): Logger {
    return new ScopedLogger(scope, this.level, this.sink);
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_RANK[this.level] >= LEVEL_RANK[level];
  }

  private format(message: string): string {
    return `[${this.scope}] ${message}`;
  }
}

/**
 * Create a logger for a component.
 *
 * @param scope - Prefix shown in brackets, usually `<Component> <id>`
 * @param level - Most verbose level that is emitted
 */
export function createLogger(scope: string, level: LogLevel = 'info', sink: LogSink = console): Logger {
  return new ScopedLogger(scope, level, sink);
}

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = createLogger('silent', 'silent');
