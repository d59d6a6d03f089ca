export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const envLevel = process.env.LOG_LEVEL;
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'warn';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

// stdout belongs to the lookup output, so every level goes to stderr.
export class Logger {
  constructor(private readonly scope: string) {}

  debug(message: string, extra?: Record<string, unknown>) {
    this.write('debug', message, extra);
  }

  info(message: string, extra?: Record<string, unknown>) {
    this.write('info', message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>) {
    this.write('warn', message, extra);
  }

  error(message: string, extra?: Record<string, unknown>) {
    this.write('error', message, extra);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, extra?: Record<string, unknown>) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
      return;
    }
    console.error(`[${this.scope}] ${level.toUpperCase()} ${message}`, extra ?? '');
  }
}

export const createLogger = (scope: string) => new Logger(scope);
