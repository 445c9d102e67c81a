export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(scope: string): Logger;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export function parseLogLevel(input: string | undefined): LogLevel {
  const level = input?.trim().toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') return level;
  return 'info';
}

type ConsoleLike = Pick<Console, 'debug' | 'log' | 'warn' | 'error'>;

class ConsoleLogger implements Logger {
  constructor(
    private readonly scope: string,
    private readonly level: LogLevel,
    private readonly out: ConsoleLike
  ) {}

  debug(message: string, context?: LogContext) {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext) {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext) {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext) {
    this.write('error', message, context);
  }

  child(scope: string): Logger {
    return new ConsoleLogger(`${this.scope}:${scope}`, this.level, this.out);
  }

  private write(level: LogLevel, message: string, context?: LogContext) {
    if (LEVELS[level] < LEVELS[this.level]) return;
    const line = `[${this.scope}] ${message}`;
    const args: unknown[] = context && Object.keys(context).length ? [line, context] : [line];
    switch (level) {
      case 'debug':
        this.out.debug(...args);
        break;
      case 'info':
        this.out.log(...args);
        break;
      case 'warn':
        this.out.warn(...args);
        break;
      case 'error':
        this.out.error(...args);
        break;
    }
  }
}

export function createLogger(
  scope: string,
  opts: { level?: LogLevel; out?: ConsoleLike } = {}
): Logger {
  return new ConsoleLogger(scope, opts.level ?? parseLogLevel(process.env.LOG_LEVEL), opts.out ?? console);
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return silentLogger;
  }
};
