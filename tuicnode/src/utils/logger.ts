import winston from 'winston';
import path from 'path';
import fs from 'fs';
import type { LoggingConfig } from '../config/config';

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `${timestamp} [${level}]: ${message}`;
    if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    return msg;
  })
);

function createFileTransports(logFile: string) {
  const logDir = path.dirname(logFile);
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  return [
    new winston.transports.File({
      filename: path.join(logDir, 'tuicnode-error.log'),
      level: 'error',
      format: logFormat,
    }),
    new winston.transports.File({
      filename: logFile,
      format: logFormat,
    }),
  ];
}

export const logger = winston.createLogger({
  level: 'info',
  defaultMeta: { service: 'tuicnode' },
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
    }),
  ],
});

/**
 * Applies the validated logging settings. File transports are added only
 * when a log file is configured.
 */
export function configureLogger(logging: LoggingConfig): void {
  logger.level = logging.level;
  if (logging.file) {
    for (const transport of createFileTransports(logging.file)) {
      logger.add(transport);
    }
  }
}

export default logger;
