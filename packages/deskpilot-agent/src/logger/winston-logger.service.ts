import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';
import * as os from 'os';
import { DeskpilotEnv } from '@deskpilot/shared';

export interface WinstonLoggerOptions {
  logDir: string;
  level: DeskpilotEnv['LOG_LEVEL'];
}

/**
 * Create the application logger: colorized console plus rotating main and
 * error logs under `logDir`.
 */
export function createWinstonLogger(options: WinstonLoggerOptions): winston.Logger {
  let logDir = path.resolve(options.logDir);

  if (!fs.existsSync(logDir)) {
    try {
      fs.mkdirSync(logDir, { recursive: true });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`Failed to create log directory ${logDir}: ${reason}`);
      logDir = os.tmpdir();
    }
  }

  const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, context, stack }) => {
      const contextStr = context ? `[${context}] ` : '';
      const stackStr = stack ? `\n${stack}` : '';
      return `[${timestamp}] [${level.toUpperCase()}] ${contextStr}${message}${stackStr}`;
    }),
  );

  // Colorized for readability
  const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, context }) => {
      const contextStr = context ? `[${context}] ` : '';
      return `[${timestamp}] ${level} ${contextStr}${message}`;
    }),
  );

  const fileRotateTransport = new DailyRotateFile({
    filename: path.join(logDir, 'deskpilot-%DATE%.log'),
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '10m',
    maxFiles: '14d',
    format: logFormat,
    level: options.level,
  });

  const errorRotateTransport = new DailyRotateFile({
    filename: path.join(logDir, 'deskpilot-error-%DATE%.log'),
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '10m',
    maxFiles: '14d',
    format: logFormat,
    level: 'error',
  });

  const consoleTransport = new winston.transports.Console({
    format: consoleFormat,
    level: options.level,
  });

  return winston.createLogger({
    level: options.level,
    transports: [consoleTransport, fileRotateTransport, errorRotateTransport],
    exceptionHandlers: [
      new winston.transports.File({
        filename: path.join(logDir, 'deskpilot-exceptions.log'),
        format: logFormat,
      }),
    ],
    rejectionHandlers: [
      new winston.transports.File({
        filename: path.join(logDir, 'deskpilot-rejections.log'),
        format: logFormat,
      }),
    ],
  });
}
