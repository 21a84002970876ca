// Console logger with level tags. FRAMECROP_LOG_LEVEL sets the threshold;
// development builds default to debug, everything else to info.

import { LOG_LEVEL_ENV } from '../config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = env[LOG_LEVEL_ENV]?.toLowerCase();
  if (isLogLevel(requested)) {
    return requested;
  }
  return env.NODE_ENV === 'development' ? 'debug' : 'info';
}

export class Logger {
  constructor(private level: LogLevel = levelFromEnv()) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  debug(...args: unknown[]): void {
    if (this.enabled('debug')) {
      console.debug('[DEBUG]', ...args);
    }
  }

  info(...args: unknown[]): void {
    if (this.enabled('info')) {
      console.info('[INFO]', ...args);
    }
  }

  warn(...args: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn('[WARN]', ...args);
    }
  }

  error(...args: unknown[]): void {
    console.error('[ERROR]', ...args);
  }
}

export const logger = new Logger();
