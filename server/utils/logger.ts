import fs from 'fs';
import path from 'path';
import type { Request, Response, NextFunction } from 'express';

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3
}

export type LogContext = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  context?: unknown;
}

export interface LoggerOptions {
  level?: string;
  logDir?: string;
  toFile?: boolean;
}

export class Logger {
  private logLevel: LogLevel;
  private logDir: string;
  private logFile: string;
  private toFile: boolean;
  private writeStream: fs.WriteStream | null = null;

  constructor(options: LoggerOptions = {}) {
    this.logLevel = this.parseLogLevel(options.level ?? process.env.LOG_LEVEL ?? 'info');
    this.logDir = options.logDir ?? process.env.LOG_DIR ?? path.join(process.cwd(), 'logs');
    this.toFile = options.toFile ?? (process.env.LOG_TO_FILE ?? 'true').toLowerCase() === 'true';
    this.logFile = this.fileForToday();
    this.openFile();
  }

  // Applies settings known only after startup, such as the loaded app config
  configure(options: LoggerOptions) {
    if (options.level !== undefined) this.logLevel = this.parseLogLevel(options.level);
    if (options.logDir !== undefined) this.logDir = options.logDir;
    if (options.toFile !== undefined) this.toFile = options.toFile;

    this.close();
    this.logFile = this.fileForToday();
    this.openFile();
  }

  private openFile() {
    if (this.toFile) {
      this.ensureLogDirectory();
      this.initializeWriteStream();
    }
  }

  private parseLogLevel(level: string): LogLevel {
    switch (level.toLowerCase()) {
      case 'error': return LogLevel.ERROR;
      case 'warn': return LogLevel.WARN;
      case 'info': return LogLevel.INFO;
      case 'debug': return LogLevel.DEBUG;
      default: return LogLevel.INFO;
    }
  }

  private fileForToday(): string {
    return path.join(this.logDir, `gallery-api-${new Date().toISOString().split('T')[0]}.log`);
  }

  private ensureLogDirectory() {
    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private initializeWriteStream() {
    this.writeStream = fs.createWriteStream(this.logFile, { flags: 'a' });
  }

  private formatMessage(level: string, message: string, context?: unknown): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level: level.toUpperCase(),
      message,
      ...(context !== undefined && { context })
    };
  }

  private writeToFile(entry: LogEntry) {
    if (this.writeStream) {
      this.writeStream.write(JSON.stringify(entry) + '\n');
    }
  }

  private writeToConsole(level: string, message: string, context?: unknown) {
    const timestamp = new Date().toISOString();
    const formattedMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}`;

    switch (level) {
      case 'error':
        console.error(formattedMessage, context ?? '');
        break;
      case 'warn':
        console.warn(formattedMessage, context ?? '');
        break;
      default:
        console.log(formattedMessage, context ?? '');
    }
  }

  error(message: string, error?: unknown) {
    if (this.logLevel >= LogLevel.ERROR) {
      const context = error instanceof Error
        ? { error: error.message, stack: error.stack }
        : error;
      this.writeToFile(this.formatMessage('error', message, context));
      this.writeToConsole('error', message, error);
    }
  }

  warn(message: string, context?: LogContext) {
    if (this.logLevel >= LogLevel.WARN) {
      this.writeToFile(this.formatMessage('warn', message, context));
      this.writeToConsole('warn', message, context);
    }
  }

  info(message: string, context?: LogContext) {
    if (this.logLevel >= LogLevel.INFO) {
      this.writeToFile(this.formatMessage('info', message, context));
      this.writeToConsole('info', message, context);
    }
  }

  debug(message: string, context?: LogContext) {
    if (this.logLevel >= LogLevel.DEBUG) {
      this.writeToFile(this.formatMessage('debug', message, context));
      this.writeToConsole('debug', message, context);
    }
  }

  // Security audit logging
  security(event: string, details: LogContext) {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: 'SECURITY',
      message: event,
      context: details
    };

    // Always recorded regardless of log level
    this.writeToFile(entry);
    if (this.logLevel >= LogLevel.WARN) {
      this.writeToConsole('warn', `SECURITY EVENT: ${event}`, details);
    }
  }

  access(req: Request, res: Response, responseTime: number) {
    this.writeToFile({
      timestamp: new Date().toISOString(),
      level: 'ACCESS',
      message: 'HTTP Request',
      context: {
        method: req.method,
        url: req.originalUrl || req.url,
        ip: req.ip,
        userAgent: req.headers['user-agent'],
        statusCode: res.statusCode,
        responseTime: `${responseTime}ms`,
        userId: req.user?.id
      }
    });
  }

  performance(operation: string, duration: number, details?: LogContext) {
    if (this.logLevel >= LogLevel.DEBUG) {
      this.writeToFile({
        timestamp: new Date().toISOString(),
        level: 'PERFORMANCE',
        message: operation,
        context: {
          duration: `${duration}ms`,
          ...details
        }
      });
      if (duration > 1000) {
        this.writeToConsole('warn', `Slow operation: ${operation}`, { duration: `${duration}ms` });
      }
    }
  }

  // Switch to a new file when the date changes
  rotateLogs() {
    if (!this.toFile) return;

    const newLogFile = this.fileForToday();
    if (newLogFile !== this.logFile) {
      this.writeStream?.end();
      this.logFile = newLogFile;
      this.initializeWriteStream();
    }
  }

  close() {
    this.writeStream?.end();
    this.writeStream = null;
  }
}

export const logger = new Logger();

const rotation = setInterval(() => {
  logger.rotateLogs();
}, 60 * 60 * 1000);
rotation.unref();

process.on('exit', () => {
  logger.close();
});

// Express middleware for access logging
export function accessLogger() {
  return (req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();

    res.on('finish', () => {
      const responseTime = Date.now() - startTime;
      logger.access(req, res, responseTime);
      if (responseTime > 1000) {
        logger.performance(`Slow request: ${req.method} ${req.path}`, responseTime, {
          statusCode: res.statusCode,
        });
      }
    });

    next();
  };
}
