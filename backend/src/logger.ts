import chalk from 'chalk';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const COLORS: Record<LogLevel, (text: string) => string> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.green,
  debug: chalk.blue,
  trace: chalk.gray,
};

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Reads a level name such as the value of `LOG_LEVEL`.
 * Missing or unknown names mean `info`.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase() ?? '';
  return isLogLevel(normalized) ? normalized : 'info';
}

export class Logger {
  constructor(
    readonly scope: string,
    readonly level: LogLevel,
  ) {}

  enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
  }

  error(message: string, ...details: unknown[]): void {
    this.write('error', message, details);
  }

  warn(message: string, ...details: unknown[]): void {
    this.write('warn', message, details);
  }

  info(message: string, ...details: unknown[]): void {
    this.write('info', message, details);
  }

  debug(message: string, ...details: unknown[]): void {
    this.write('debug', message, details);
  }

  trace(message: string, ...details: unknown[]): void {
    this.write('trace', message, details);
  }

  child(scope: string): Logger {
    return new Logger(scope, this.level);
  }

  private write(level: LogLevel, message: string, details: unknown[]): void {
    if (!this.enabled(level)) return;

    const line = `${chalk.gray(new Date().toISOString())} ${COLORS[level](level.toUpperCase().padEnd(5))} ${chalk.cyan(`[${this.scope}]`)} ${message}`;
    if (level === 'error' || level === 'warn') {
      console.error(line, ...details);
    } else {
      console.log(line, ...details);
    }
  }
}

export function createLogger(scope: string, level: LogLevel = parseLogLevel(process.env.LOG_LEVEL)): Logger {
  return new Logger(scope, level);
}
