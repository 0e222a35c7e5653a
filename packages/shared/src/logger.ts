/**
 * Structured Logger with Winston
 *
 * Features:
 * - Multiple log levels (error, warn, info, debug)
 * - File logging with daily rotation
 * - Console output for development
 * - Structured JSON logs
 * - Context injection (service, component, strategyId, etc)
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerConfig {
  /** Service name (trader, backtest, cli) */
  service: string;
  /** Log level */
  level?: LogLevel;
  /** Enable console output */
  console?: boolean;
  /** Enable file logging */
  file?: boolean;
  /** Log directory */
  logDir?: string;
  /** Drop every entry (tests) */
  silent?: boolean;
}

export interface LogContext {
  [key: string]: unknown;
}

/**
 * Logger class with structured logging
 */
export class Logger {
  private logger: winston.Logger;
  private service: string;

  constructor(config: LoggerConfig, base?: winston.Logger) {
    this.service = config.service;
    this.logger = base ?? Logger.createWinston(config);
  }

  private static createWinston(config: LoggerConfig): winston.Logger {
    const logDir = config.logDir || path.join(process.cwd(), 'logs', config.service);
    const fileEnabled = config.file === true && !config.silent;
    if (fileEnabled) {
      fs.mkdirSync(logDir, { recursive: true });
    }

    // File format
    const logFormat = winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.metadata({ fillExcept: ['message', 'level', 'timestamp', 'service'] }),
      winston.format.json()
    );

    // Console format (pretty print for dev)
    const consoleFormat = winston.format.combine(
      winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? `\n${JSON.stringify(meta, null, 2)}` : '';
        return `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}${metaStr}`;
      })
    );

    const transports: winston.transport[] = [];

    if (config.console !== false) {
      transports.push(
        new winston.transports.Console({
          format: consoleFormat,
        })
      );
    }

    if (fileEnabled) {
      // Combined logs
      transports.push(
        new DailyRotateFile({
          filename: path.join(logDir, `${config.service}-%DATE%.log`),
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '14d',
          format: logFormat,
        })
      );

      // Error logs (separate file)
      transports.push(
        new DailyRotateFile({
          filename: path.join(logDir, `${config.service}-error-%DATE%.log`),
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '30d',
          level: 'error',
          format: logFormat,
        })
      );
    }

    return winston.createLogger({
      level: config.level || 'info',
      silent: config.silent === true,
      defaultMeta: { service: config.service },
      transports,
    });
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    this.logger.log(level, message, context);
  }

  /**
   * Create child logger with additional context
   */
  child(context: LogContext): Logger {
    return new Logger({ service: this.service }, this.logger.child(context));
  }

  /**
   * Close logger and flush logs
   */
  async close(): Promise<void> {
    return new Promise((resolve) => {
      this.logger.close();
      // Give it a moment to flush
      setTimeout(resolve, 100);
    });
  }
}

/**
 * Create a logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}
