import winston from 'winston';
import fs from 'fs-extra';
import * as path from 'path';
import { settings } from './settings.js';

// Custom log format
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    return JSON.stringify({
      timestamp,
      level,
      message,
      ...meta
    });
  })
);

// Create logger instance
export const logger = winston.createLogger({
  level: settings.logLevel,
  format: logFormat,
  defaultMeta: { service: 'query-assembler' },
  silent: settings.env === 'test',
  transports: [],
});

// File logs only when a directory is configured
if (settings.logDir) {
  fs.ensureDirSync(settings.logDir);

  // Write all logs with importance level of `error` or less to `error.log`
  logger.add(new winston.transports.File({
    filename: path.join(settings.logDir, 'error.log'),
    level: 'error',
    maxsize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5
  }));

  logger.add(new winston.transports.File({
    filename: path.join(settings.logDir, 'combined.log'),
    maxsize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5
  }));
}

// Console logging outside production, or when nothing else would receive the logs
if (settings.env !== 'production' || !settings.logDir) {
  logger.add(new winston.transports.Console({
    // keep stdout for CLI output
    stderrLevels: Object.keys(winston.config.npm.levels),
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaString = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
        return `${timestamp} ${level}: ${message} ${metaString}`;
      })
    )
  }));
}

// Specific loggers for different components
export const queryLogger = logger.child({ component: 'query' });
export const validationLogger = logger.child({ component: 'validation' });
export const templateLogger = logger.child({ component: 'templates' });
export const apiLogger = logger.child({ component: 'api' });
