/**
 * Tagged console logger
 *
 * Output format follows the existing `[Component] message` convention.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalLevel: LogLevel = parseLevel(process.env.LOG_LEVEL) ?? 'info';

function parseLevel(value: string | undefined): LogLevel | undefined {
  const level = value?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return undefined;
}

/**
 * Set the level for every logger. LOG_LEVEL in the environment takes precedence.
 */
export function setLogLevel(level: LogLevel): void {
  globalLevel = parseLevel(process.env.LOG_LEVEL) ?? level;
}

export function getLogLevel(): LogLevel {
  return globalLevel;
}

export class Logger {
  constructor(private readonly tag: string) {}

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[globalLevel];
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('debug')) {
      console.debug(`[${this.tag}] ${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) {
      console.log(`[${this.tag}] ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn(`[${this.tag}] ${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('error')) {
      console.error(`[${this.tag}] ${message}`, ...args);
    }
  }
}
