export enum LogLevel {
  DEBUG,
  INFO,
  WARN,
  ERROR,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
};

/**
 * Map a level name such as "warn" to its LogLevel
 */
export function parseLogLevel(name: string | undefined, fallback = LogLevel.INFO): LogLevel {
  switch (name?.trim().toLowerCase()) {
    case 'debug': return LogLevel.DEBUG;
    case 'info': return LogLevel.INFO;
    case 'warn':
    case 'warning': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    default: return fallback;
  }
}

export interface ScopedLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export class Logger implements ScopedLogger {
  private static instance: Logger | undefined;
  private logLevel: LogLevel = LogLevel.INFO;

  private constructor() {}

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  public setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  public getLogLevel(): LogLevel {
    return this.logLevel;
  }

  /**
   * Logger that tags every line with `[scope]`
   */
  public scoped(scope: string): ScopedLogger {
    return {
      debug: (message, ...args) => this.log(LogLevel.DEBUG, `[${scope}] ${message}`, args),
      info: (message, ...args) => this.log(LogLevel.INFO, `[${scope}] ${message}`, args),
      warn: (message, ...args) => this.log(LogLevel.WARN, `[${scope}] ${message}`, args),
      error: (message, ...args) => this.log(LogLevel.ERROR, `[${scope}] ${message}`, args),
    };
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (level >= this.logLevel) {
      const timestamp = new Date().toISOString();
      const levelName = LOG_LEVEL_NAMES[level];
      console.log(`[${timestamp}] [${levelName}] ${message}`, ...args);
    }
  }

  public debug(message: string, ...args: unknown[]): void {
    this.log(LogLevel.DEBUG, message, args);
  }

  public info(message: string, ...args: unknown[]): void {
    this.log(LogLevel.INFO, message, args);
  }

  public warn(message: string, ...args: unknown[]): void {
    this.log(LogLevel.WARN, message, args);
  }

  public error(message: string, ...args: unknown[]): void {
    this.log(LogLevel.ERROR, message, args);
  }
}

export const logger = Logger.getInstance();
