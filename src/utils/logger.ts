import winston from 'winston';
import path from 'path';
import fs from 'fs';
import DailyRotateFile from 'winston-daily-rotate-file';

const isTest = process.env.NODE_ENV === 'test';
const isProduction = process.env.NODE_ENV === 'production';

/**
 * File log format (JSON structured)
 */
const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json(),
);

/**
 * Developer console format (color + readable)
 */
const consoleFormat = winston.format.combine(
  winston.format.colorize({ all: true }),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const extra = Object.keys(meta).length ? `\n${JSON.stringify(meta, null, 2)}` : '';
    return `${String(timestamp)} [${level}]: ${String(message)}${extra}`;
  }),
);

function fileTransports(): winston.transport[] {
  if (isTest) return [];

  const logDir = path.resolve(process.env.LOG_DIR || 'logs');
  if (!fs.existsSync(logDir)) fs.mkdirSync(logDir, { recursive: true });

  return [
    new DailyRotateFile({
      dirname: logDir,
      filename: 'error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      level: 'error',
      maxSize: '10m',
      maxFiles: '14d',
    }),
    new DailyRotateFile({
      dirname: logDir,
      filename: 'combined-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      maxSize: '10m',
      maxFiles: '14d',
    }),
  ];
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : 'debug'),
  defaultMeta: { service: process.env.SERVICE_NAME || 'conductor' },
  format: fileFormat,
  silent: isTest,
  transports: fileTransports(),
});

if (!isProduction && !isTest) {
  logger.add(
    new winston.transports.Console({
      format: consoleFormat,
    }),
  );
}

/**
 * Route fatal process errors into the log. Called once by each entrypoint.
 */
export const registerProcessErrorLogging = (): void => {
  process.on('uncaughtException', (err) => {
    logger.error('💥 Uncaught Exception:', err);
  });
  process.on('unhandledRejection', (reason) => {
    logger.error('⚠️ Unhandled Promise Rejection:', reason);
  });
};

export const closeLogger = async (): Promise<void> =>
  new Promise((resolve) => {
    logger.on('finish', resolve);
    logger.end();
  });
