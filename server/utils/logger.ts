/**
 * Standardized logging system for the settlement analytics service
 *
 * Entries go to the console (coloured, one line each) and, when enabled, to a
 * daily JSON-lines file under the log directory.
 */

import fs from 'fs';
import path from 'path';
import { AppError, ErrorSeverity } from './errors';

// Log levels and colors for console output
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical'
}

export interface LogOptions {
  level?: LogLevel;
  module?: string;
  context?: Record<string, unknown>;
  error?: Error;
  timestamp?: Date;
}

export interface LogEntry {
  message: string;
  level: LogLevel;
  module: string;
  context?: Record<string, unknown>;
  error?: {
    message: string;
    stack?: string;
    name?: string;
  };
  timestamp: string;
}

export interface LoggerOptions {
  logDir?: string;
  enableConsole?: boolean;
  enableFile?: boolean;
  minLevel?: LogLevel;
}

const levelOrder: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARNING]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.CRITICAL]: 4
};

// Map from ErrorSeverity to LogLevel
const severityToLevel = {
  [ErrorSeverity.INFO]: LogLevel.INFO,
  [ErrorSeverity.WARNING]: LogLevel.WARNING,
  [ErrorSeverity.ERROR]: LogLevel.ERROR,
  [ErrorSeverity.CRITICAL]: LogLevel.CRITICAL
} as const;

// Terminal colors
const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  bold: '\x1b[1m'
};

const levelColors: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: colors.cyan,
  [LogLevel.INFO]: colors.green,
  [LogLevel.WARNING]: colors.yellow,
  [LogLevel.ERROR]: colors.red,
  [LogLevel.CRITICAL]: `${colors.red}${colors.bold}`
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevel).includes(value);
}

/**
 * Main logger class
 */
export class Logger {
  private logDir: string;
  private enableConsole: boolean;
  private enableFile: boolean;
  private minLevel: LogLevel;
  private currentLogFile: string | null = null;
  private currentLogStream: fs.WriteStream | null = null;

  constructor(options: LoggerOptions = {}) {
    this.logDir = options.logDir ?? './logs';
    this.enableConsole = options.enableConsole ?? true;
    this.enableFile = options.enableFile ?? true;
    this.minLevel = options.minLevel ?? LogLevel.INFO;
  }

  /**
   * Reconfigure outputs at runtime, e.g. once config has been loaded
   */
  configure(options: LoggerOptions): void {
    if (options.logDir !== undefined && options.logDir !== this.logDir) {
      this.close();
      this.logDir = options.logDir;
    }
    if (options.enableConsole !== undefined) this.enableConsole = options.enableConsole;
    if (options.enableFile !== undefined) {
      if (!options.enableFile) this.close();
      this.enableFile = options.enableFile;
    }
    if (options.minLevel !== undefined) this.minLevel = options.minLevel;
  }

  /**
   * Log a message
   */
  log(message: string, options: LogOptions = {}): void {
    const {
      level = LogLevel.INFO,
      module = 'app',
      context = {},
      error,
      timestamp = new Date()
    } = options;

    if (levelOrder[level] < levelOrder[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      message,
      level,
      module,
      context,
      timestamp: timestamp.toISOString()
    };

    if (error) {
      entry.error = {
        message: error.message,
        stack: error.stack,
        name: error.name
      };
    }

    if (this.enableFile) {
      this.writeToFile(entry);
    }

    if (this.enableConsole) {
      this.writeToConsole(entry);
    }
  }

  debug(message: string, options: Omit<LogOptions, 'level'> = {}): void {
    this.log(message, { ...options, level: LogLevel.DEBUG });
  }

  info(message: string, options: Omit<LogOptions, 'level'> = {}): void {
    this.log(message, { ...options, level: LogLevel.INFO });
  }

  warning(message: string, options: Omit<LogOptions, 'level'> = {}): void {
    this.log(message, { ...options, level: LogLevel.WARNING });
  }

  error(message: string, options: Omit<LogOptions, 'level'> = {}): void {
    this.log(message, { ...options, level: LogLevel.ERROR });
  }

  critical(message: string, options: Omit<LogOptions, 'level'> = {}): void {
    this.log(message, { ...options, level: LogLevel.CRITICAL });
  }

  /**
   * Log an error object, using its severity and context when it is an AppError
   */
  logError(error: Error, options: Omit<LogOptions, 'error'> = {}): void {
    const level = error instanceof AppError ? severityToLevel[error.severity] : LogLevel.ERROR;
    const errorContext = error instanceof AppError ? error.context : {};

    this.log(error.message, {
      ...options,
      level,
      error,
      context: {
        ...options.context,
        ...errorContext
      }
    });
  }

  close(): void {
    if (this.currentLogStream) {
      this.currentLogStream.end();
    }
    this.currentLogStream = null;
    this.currentLogFile = null;
  }

  /**
   * Close the file stream and resolve once buffered entries are on disk
   */
  async flush(): Promise<void> {
    const stream = this.currentLogStream;
    this.currentLogStream = null;
    this.currentLogFile = null;

    if (stream) {
      await new Promise<void>(resolve => stream.end(() => resolve()));
    }
  }

  /**
   * Get the current log file name based on date
   */
  private getLogFileName(): string {
    const date = new Date();
    const formattedDate = `${date.getFullYear()}-${String(date.getMonth() + 1).padStart(2, '0')}-${String(date.getDate()).padStart(2, '0')}`;
    return path.join(this.logDir, `settlement_${formattedDate}.log`);
  }

  private writeToFile(entry: LogEntry): void {
    try {
      const logFileName = this.getLogFileName();

      let stream = this.currentLogStream;
      if (this.currentLogFile !== logFileName || stream === null) {
        this.close();
        fs.mkdirSync(this.logDir, { recursive: true });
        stream = fs.createWriteStream(logFileName, { flags: 'a' });
        this.currentLogFile = logFileName;
        this.currentLogStream = stream;
      }

      stream.write(JSON.stringify(entry) + '\n');
    } catch (err) {
      console.error(`Failed to write to log file: ${err}`);
    }
  }

  /**
   * Format: [TIME] [LEVEL] [MODULE] MESSAGE
   */
  private writeToConsole(entry: LogEntry): void {
    const levelColor = levelColors[entry.level] || colors.reset;
    const time = entry.timestamp.split('T')[1].replace('Z', '');
    const prefix = `${colors.cyan}[${time}]${colors.reset} ${levelColor}[${entry.level.toUpperCase()}]${colors.reset} ${colors.blue}[${entry.module}]${colors.reset}`;
    const write = levelOrder[entry.level] >= levelOrder[LogLevel.ERROR] ? console.error : console.log;

    write(`${prefix} ${entry.message}`);

    if (entry.level === LogLevel.DEBUG || entry.level === LogLevel.ERROR || entry.level === LogLevel.CRITICAL) {
      if (Object.keys(entry.context || {}).length > 0) {
        write(`${colors.cyan}Context:${colors.reset}`, entry.context);
      }
    }

    if (entry.error?.stack && (entry.level === LogLevel.ERROR || entry.level === LogLevel.CRITICAL)) {
      write(`${colors.red}Stack:${colors.reset} ${entry.error.stack}`);
    }
  }
}

const envLevel = process.env.LOG_LEVEL;

// Singleton used across the service; config.ts refines it at startup
export const logger = new Logger({
  logDir: process.env.LOG_DIR || './logs',
  enableFile: process.env.LOG_TO_FILE === 'true',
  minLevel: envLevel && isLogLevel(envLevel) ? envLevel : LogLevel.INFO
});
