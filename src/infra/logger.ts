import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { findPackageRoot } from './paths.js';

export type LogContext = Record<string, unknown>;

export interface ILogger {
  info(message: string, context?: LogContext): void;
  error(message: string, error?: unknown): void;
  warn(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

export interface WinstonLoggerOptions {
  level?: string;
  logFile?: string;
}

export class WinstonLogger implements ILogger {
  private logger: winston.Logger;
  private static sharedLogger: winston.Logger | null = null;

  constructor(options: WinstonLoggerOptions = {}) {
    // One shared instance so every component appends to the same run log
    if (!WinstonLogger.sharedLogger) {
      const logFile = options.logFile ?? path.join(findPackageRoot(), 'logs', 'hostforge.log');
      fs.mkdirSync(path.dirname(logFile), { recursive: true });

      WinstonLogger.sharedLogger = winston.createLogger({
        level: options.level ?? process.env.LOG_LEVEL ?? 'info',
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.json()
        ),
        transports: [
          new winston.transports.Console({
            format: winston.format.combine(
              winston.format.colorize(),
              winston.format.printf(({ timestamp, level, message, ...meta }) => {
                return `${timestamp} [${level}]: ${message} ${Object.keys(meta).length ? JSON.stringify(meta) : ''}`;
              })
            ),
          }),
          new winston.transports.File({
            filename: logFile,
            level: 'debug',
            options: { flags: 'a' },
          }),
        ],
      });

      WinstonLogger.sharedLogger.on('error', (err) => {
        console.error('Winston logger error:', err);
      });
    }

    this.logger = WinstonLogger.sharedLogger;
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(message, context);
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.logger.error(message, {
        errorMessage: error.message,
        stack: error.stack,
      });
    } else if (error !== undefined) {
      this.logger.error(message, { error });
    } else {
      this.logger.error(message);
    }
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(message, context);
  }
}

export class LoggerStub implements ILogger {
  info(_message: string, _context?: LogContext): void {}
  error(_message: string, _error?: unknown): void {}
  warn(_message: string, _context?: LogContext): void {}
  debug(_message: string, _context?: LogContext): void {}
}
