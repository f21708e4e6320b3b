import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggingOptions {
  level: LogLevel;
  directory?: string;
}

const logger = winston.createLogger({
  level: process.env.FILEWIRE_LOG_LEVEL ?? 'info',
  format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  transports: [new winston.transports.Console({ format: winston.format.simple() })],
});

/**
 * Applies the configured level and, when a directory is given, adds
 * error.log and combined.log file transports.
 */
export function configureLogger(options: LoggingOptions): winston.Logger {
  logger.level = options.level;

  if (options.directory) {
    const logDir = path.resolve(options.directory);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }

    logger.add(
      new winston.transports.File({ filename: path.join(logDir, 'error.log'), level: 'error' })
    );
    logger.add(new winston.transports.File({ filename: path.join(logDir, 'combined.log') }));
  }

  logger.debug('Logger configured', { level: options.level, directory: options.directory });
  return logger;
}

export { logger };
