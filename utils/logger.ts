/**
 * Winston-based logger with structured output.
 */

import { createLogger as createWinstonLogger, format, transports, Logger } from 'winston';
import * as path from 'path';
import * as fs from 'fs';

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
const logDir = process.env.LOG_DIR || path.join(process.cwd(), 'logs');
const writeLogFiles = !isTest && process.env.LOG_TO_FILE !== 'false';

if (writeLogFiles && !fs.existsSync(logDir)) {
  fs.mkdirSync(logDir, { recursive: true });
}

const logFormat = format.combine(
  format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  format.errors({ stack: true }),
  format.splat(),
  format.json()
);

const consoleFormat = format.combine(
  format.colorize(),
  format.timestamp({ format: 'HH:mm:ss' }),
  format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `${String(timestamp)} [${level}]: ${String(message)}`;
    if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    return msg;
  })
);

const fileTransports: transports.FileTransportInstance[] = writeLogFiles
  ? [
    new transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: 5 * 1024 * 1024,
      maxFiles: 5
    }),
    new transports.File({
      filename: path.join(logDir, 'combined.log'),
      maxsize: 5 * 1024 * 1024,
      maxFiles: 5
    })
  ]
  : [];

export const logger: Logger = createWinstonLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  defaultMeta: { service: 'ig-comment-crawler' },
  transports: [...fileTransports]
});

if (process.env.NODE_ENV !== 'production') {
  logger.add(
    new transports.Console({
      format: consoleFormat,
      stderrLevels: ['error', 'warn']
    })
  );
}

export interface ModuleLogger {
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
  verbose: (message: string, meta?: Record<string, unknown>) => void;
}

interface CodedErrorShape {
  code: unknown;
  retryable: unknown;
  context?: unknown;
  originalError?: unknown;
}

function isCodedError(error: Error): error is Error & CodedErrorShape {
  return 'code' in error && 'retryable' in error;
}

export function normalizeErrorMeta(
  error: Error | undefined,
  extraMeta: Record<string, unknown>,
): Record<string, unknown> {
  if (!error) {
    return extraMeta;
  }

  const meta: Record<string, unknown> = { ...extraMeta };

  if (isCodedError(error)) {
    // ScraperError-like shape
    meta.errorCode = error.code;
    meta.retryable = error.retryable;
    meta.errorContext = error.context;
    if (error.originalError instanceof Error) {
      meta.originalError = {
        name: error.originalError.name,
        message: error.originalError.message,
      };
    }
  } else {
    meta.errorName = error.name;
    meta.errorMessage = error.message;
  }

  return meta;
}

export function createModuleLogger(module: string): ModuleLogger {
  return {
    info: (message: string, meta: Record<string, unknown> = {}) =>
      logger.info(message, { module, ...meta }),
    warn: (message: string, meta: Record<string, unknown> = {}) =>
      logger.warn(message, { module, ...meta }),
    error: (message: string, error?: Error, meta: Record<string, unknown> = {}) =>
      logger.error(message, normalizeErrorMeta(error, { module, ...meta })),
    debug: (message: string, meta: Record<string, unknown> = {}) =>
      logger.debug(message, { module, ...meta }),
    verbose: (message: string, meta: Record<string, unknown> = {}) =>
      logger.verbose(message, { module, ...meta }),
  };
}

export type LogContext = Record<string, unknown>;

/**
 * Module logger with a sticky context and a performance helper.
 */
export class EnhancedLogger {
  private baseLogger: ModuleLogger;
  private context: LogContext = {};

  constructor(module: string) {
    this.baseLogger = createModuleLogger(module);
  }

  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  info(message: string, meta?: LogContext): void {
    this.baseLogger.info(message, { ...this.context, ...meta });
  }

  warn(message: string, meta?: LogContext): void {
    this.baseLogger.warn(message, { ...this.context, ...meta });
  }

  error(message: string, error?: Error, meta?: LogContext): void {
    this.baseLogger.error(message, error, { ...this.context, ...meta });
  }

  debug(message: string, meta?: LogContext): void {
    this.baseLogger.debug(message, { ...this.context, ...meta });
  }

  performance(operation: string, duration: number, metadata?: LogContext): void {
    this.baseLogger.info(`[PERF] ${operation}`, {
      ...this.context,
      ...metadata,
      duration,
      operation,
      type: 'performance'
    });
  }
}

export function createEnhancedLogger(module: string): EnhancedLogger {
  return new EnhancedLogger(module);
}

export const LOG_LEVELS = {
  ERROR: 'error',
  WARN: 'warn',
  INFO: 'info',
  DEBUG: 'debug',
  VERBOSE: 'verbose'
} as const;

export function setLogLevel(level: string): void {
  logger.level = level;
}

export async function closeLogger(): Promise<void> {
  await new Promise<void>((resolve) => {
    logger.on('finish', resolve);
    logger.end();
  });
}
