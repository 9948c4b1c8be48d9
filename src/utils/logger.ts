import winston from 'winston';
import path from 'path';

/**
 * Logger Configuration
 *
 * Structured logging for the filter and analysis pipelines.
 * Console output is colorized; file output is JSON under ./logs.
 */

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, component, ...metadata }) => {
    const line = `${timestamp} [${level}] ${component}: ${message}`;
    return Object.keys(metadata).length > 0 ? `${line} ${JSON.stringify(metadata)}` : line;
  })
);

function fileTransports(): winston.transport[] {
  if (process.env.LOG_FILES === 'false') {
    return [];
  }

  const logDir = process.env.LOG_DIR || path.join(process.cwd(), 'logs');
  return [
    // File output - all logs
    new winston.transports.File({
      filename: path.join(logDir, 'combined.log'),
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    // File output - errors only
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
  ];
}

/**
 * Create a logger instance
 * @param component Component name (e.g., 'ArchiveLocator', 'Consolidator')
 */
export function createLogger(component: string): winston.Logger {
  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: logFormat,
    defaultMeta: { component },
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
      }),
      ...fileTransports(),
    ],
  });
}

/**
 * Default logger instance
 */
export const logger = createLogger('App');

/**
 * Normalize an unknown thrown value into log metadata
 */
export function errorMeta(error: unknown): { error: string; stack?: string } {
  return {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  };
}
