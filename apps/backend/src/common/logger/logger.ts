import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { LoggingConfig } from '../../config/configuration';

/**
 * DI token for the application winston logger
 */
export const APP_LOGGER = Symbol('APP_LOGGER');

/**
 * Custom log levels
 */
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

/**
 * Create the scoring service logger: JSON file transport plus a readable console line
 */
export function createAppLogger(
  component: string,
  config: LoggingConfig
): winston.Logger {
  if (!fs.existsSync(config.directory)) {
    fs.mkdirSync(config.directory, { recursive: true });
  }

  const logFile = path.join(config.directory, 'scoring.log');

  return winston.createLogger({
    levels,
    level: config.level,
    format: winston.format.combine(
      winston.format.timestamp({
        format: 'YYYY-MM-DD HH:mm:ss.SSS',
      }),
      winston.format.errors({ stack: true }),
      winston.format.splat(),
      winston.format.json()
    ),
    defaultMeta: { component },
    transports: [
      new winston.transports.File({
        filename: logFile,
        maxsize: parseSize(config.maxFileSize),
        maxFiles: config.maxFiles,
      }),
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, component: name, ...rest }) => {
            const meta = Object.keys(rest).length ? JSON.stringify(rest) : '';
            return `${timestamp} [${name}] ${level}: ${message} ${meta}`;
          })
        ),
      }),
    ],
  });
}

/**
 * Logger with no transports output, for tests and tooling
 */
export function createSilentLogger(): winston.Logger {
  return winston.createLogger({
    levels,
    silent: true,
    transports: [new winston.transports.Console()],
  });
}

/**
 * Parse size string (e.g., "10MB") to bytes
 */
export function parseSize(sizeStr: string): number {
  const units: Record<string, number> = {
    B: 1,
    KB: 1024,
    MB: 1024 * 1024,
    GB: 1024 * 1024 * 1024,
  };

  const match = sizeStr.match(/^(\d+)(B|KB|MB|GB)$/i);
  if (!match) {
    throw new Error(`Invalid size format: ${sizeStr}`);
  }

  const [, value, unit] = match;
  return parseInt(value, 10) * units[unit.toUpperCase()];
}
