import winston from 'winston';
import { join } from 'path';

const logsDir = process.env.LOGS_DIR || './logs';
const isTest = process.env.NODE_ENV === 'test';

// JSON lines for the files
const customFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `${timestamp} [${level}] ${message}`;

    if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta, null, 2)}`;
    }

    return msg;
  })
);

const fileTransports: winston.transports.FileTransportInstance[] = isTest
  ? []
  : [
      new winston.transports.File({
        filename: join(logsDir, 'combined.log'),
        level: 'info',
        maxsize: 10485760, // 10MB
        maxFiles: 5
      }),
      new winston.transports.File({
        filename: join(logsDir, 'error.log'),
        level: 'error',
        maxsize: 10485760, // 10MB
        maxFiles: 5
      })
    ];

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: customFormat,
  silent: isTest,
  transports: [
    new winston.transports.Console({
      format: consoleFormat
    }),
    ...fileTransports
  ],

  exceptionHandlers: isTest
    ? []
    : [new winston.transports.File({ filename: join(logsDir, 'exceptions.log') })],

  rejectionHandlers: isTest
    ? []
    : [new winston.transports.File({ filename: join(logsDir, 'rejections.log') })]
});

if (process.env.NODE_ENV === 'production') {
  logger.level = 'info';
}

/**
 * Normalizes anything thrown into a loggable message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export default logger;
