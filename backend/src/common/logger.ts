import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';
import { LoggerService } from '@nestjs/common';

// Determine log directory based on platform
const getLogDirectory = (): string => {
  if (process.env.WAVEFRAME_LOG_DIR) {
    return process.env.WAVEFRAME_LOG_DIR;
  }

  if (process.env.NODE_ENV === 'development') {
    // In development, log to project root
    return path.join(process.cwd(), 'logs');
  }

  const platform = process.platform;
  const homeDir = process.env.HOME || process.env.USERPROFILE || '.';

  if (platform === 'darwin') {
    // macOS: ~/Library/Logs/Waveframe
    return path.join(homeDir, 'Library', 'Logs', 'Waveframe');
  } else if (platform === 'win32') {
    // Windows: %APPDATA%/waveframe/logs
    const appData = process.env.APPDATA || path.join(homeDir, 'AppData', 'Roaming');
    return path.join(appData, 'waveframe', 'logs');
  }
  // Linux: ~/.config/waveframe/logs
  return path.join(homeDir, '.config', 'waveframe', 'logs');
};

// Ensure log directory exists
const logDir = getLogDirectory();
if (!fs.existsSync(logDir)) {
  fs.mkdirSync(logDir, { recursive: true });
}

// Custom format for better readability
const customFormat = winston.format.printf(({ level, message, timestamp, context, ...metadata }) => {
  const scope = typeof context === 'string' ? ` [${context}]` : '';
  let msg = `${timestamp} [${level.toUpperCase()}]${scope} ${message}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  return msg;
});

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    customFormat
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.timestamp({ format: 'HH:mm:ss' }),
        customFormat,
        winston.format.colorize({ all: true })
      )
    }),
    // All logs
    new winston.transports.File({
      filename: path.join(logDir, 'backend.log'),
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
      tailable: true
    }),
    // Errors only
    new winston.transports.File({
      filename: path.join(logDir, 'backend-error.log'),
      level: 'error',
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
      tailable: true
    })
  ],
  exitOnError: false
});

const join = (args: unknown[]): string =>
  args.map(a => (a instanceof Error ? a.stack ?? a.message : String(a))).join(' ');

export const log = {
  info: (...args: unknown[]) => logger.info(join(args)),
  error: (...args: unknown[]) => logger.error(join(args)),
  warn: (...args: unknown[]) => logger.warn(join(args)),
  debug: (...args: unknown[]) => logger.debug(join(args)),
  verbose: (...args: unknown[]) => logger.verbose(join(args)),
};

/**
 * Routes Nest's Logger (used by every service) through winston
 */
export class WinstonNestLogger implements LoggerService {
  log(message: unknown, context?: string): void {
    logger.info(String(message), { context });
  }

  error(message: unknown, trace?: unknown, context?: string): void {
    const detail = trace instanceof Error ? trace.stack ?? trace.message : trace;
    logger.error(detail ? `${String(message)}\n${String(detail)}` : String(message), { context });
  }

  warn(message: unknown, context?: string): void {
    logger.warn(String(message), { context });
  }

  debug(message: unknown, context?: string): void {
    logger.debug(String(message), { context });
  }

  verbose(message: unknown, context?: string): void {
    logger.verbose(String(message), { context });
  }
}

export default log;

export { logger };
