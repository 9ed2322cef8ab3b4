import {isRecord} from './guards';

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
};

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const configured = env.LOG_LEVEL?.trim().toLowerCase();
  if (configured && configured in LEVEL_NAMES) {
    return LEVEL_NAMES[configured];
  }
  // In production only errors, warnings and important events
  return env.NODE_ENV === 'production' ? LogLevel.INFO : LogLevel.DEBUG;
}

export class Logger {
  constructor(private readonly level: LogLevel = resolveLogLevel()) {}

  private shouldLog(level: LogLevel): boolean {
    return level <= this.level;
  }

  private formatMessage(level: string, message: string): string {
    const timestamp = new Date().toISOString().substring(11, 19);
    return `[${timestamp}] ${level}: ${message}`;
  }

  error(message: string, error?: unknown): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.formatMessage('ERROR', message + describeCause(error)));
    }
  }

  warn(message: string, error?: unknown): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage('WARN', message + describeCause(error)));
    }
  }

  info(message: string): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.log(this.formatMessage('INFO', message));
    }
  }

  debug(message: string): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage('DEBUG', message));
    }
  }
}

function describeCause(error: unknown): string {
  if (error === undefined) {
    return '';
  }
  if (isRecord(error) && typeof error.message === 'string') {
    return `: ${typeof error.stack === 'string' ? error.stack : error.message}`;
  }
  return `: ${String(error)}`;
}

export const logger = new Logger();
