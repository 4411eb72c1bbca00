// Diagnostic logging for the acceptance validator

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  timestamps?: boolean;
  /** Destination for formatted lines; stderr keeps the report on stdout clean */
  write?: (line: string) => void;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: LogLevel.WARN,
  prefix: '[acceptance]',
  timestamps: false
};

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT
};

/**
 * Parse a level name such as "debug" or "WARN"
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVEL_NAMES[name.trim().toLowerCase()];
}

/**
 * Leveled logger writing one line per entry
 */
export class Logger {
  private config: LoggerConfig;
  private static instance: Logger | null = null;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Replace the shared logger
   */
  static configure(config: Partial<LoggerConfig>): Logger {
    Logger.instance = new Logger(config);
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  private format(level: string, message: string, context?: Record<string, unknown>): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    if (this.config.prefix) {
      parts.push(this.config.prefix);
    }

    parts.push(`[${level}]`);
    parts.push(message);

    if (context && Object.keys(context).length > 0) {
      parts.push(JSON.stringify(context));
    }

    return parts.join(' ');
  }

  private emit(level: LogLevel, label: string, message: string, context?: Record<string, unknown>): void {
    if (this.config.level > level) {
      return;
    }
    const line = this.format(label, message, context);
    if (this.config.write) {
      this.config.write(line);
    } else {
      console.error(line);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, 'DEBUG', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, 'INFO', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, 'WARN', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, 'ERROR', message, context);
  }

  /**
   * Log an error with its stack trace
   */
  exception(error: Error, context?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, 'ERROR', error.message, {
      ...context,
      name: error.name,
      stack: error.stack
    });
  }
}

/**
 * Shared logger; reconfigure through Logger.configure
 */
export function getLogger(): Logger {
  return Logger.getInstance();
}
