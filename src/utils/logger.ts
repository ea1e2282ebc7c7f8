// src/utils/logger.ts
interface LogLevel {
  ERROR: 0;
  WARN: 1;
  INFO: 2;
  DEBUG: 3;
}

export type LogLevelName = keyof LogLevel;
export type LogMeta = Record<string, unknown>;

const LOG_LEVELS: LogLevel = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3
};

export function isLogLevel(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export class Logger {
  private level: number;

  constructor(level: LogLevelName = 'INFO') {
    this.level = LOG_LEVELS[level];
  }

  setLevel(level: LogLevelName) {
    this.level = LOG_LEVELS[level];
  }

  isEnabled(level: LogLevelName): boolean {
    return LOG_LEVELS[level] <= this.level;
  }

  private log(level: LogLevelName, message: string, meta?: LogMeta) {
    if (!this.isEnabled(level)) return;

    const timestamp = new Date().toISOString();

    if (level === 'ERROR') {
      console.error(`[${timestamp}] ${level}: ${message}`, meta || '');
    } else if (level === 'WARN') {
      console.warn(`[${timestamp}] ${level}: ${message}`, meta || '');
    } else {
      console.log(`[${timestamp}] ${level}: ${message}`, meta || '');
    }
  }

  error(message: string, meta?: LogMeta) {
    this.log('ERROR', message, meta);
  }

  warn(message: string, meta?: LogMeta) {
    this.log('WARN', message, meta);
  }

  info(message: string, meta?: LogMeta) {
    this.log('INFO', message, meta);
  }

  debug(message: string, meta?: LogMeta) {
    this.log('DEBUG', message, meta);
  }
}

export function createLogger(level: string = 'INFO'): Logger {
  return new Logger(isLogLevel(level) ? level : 'INFO');
}

export const logger = createLogger((process.env.LOG_LEVEL || 'INFO').toUpperCase());
