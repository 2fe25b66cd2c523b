/**
 * Core Logger Module
 *
 * Winston-based logging with configurable log levels and structured metadata.
 */

import winston from 'winston';
import type { LogLevel } from '@servefs/config';

export type { LogLevel };

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  level: LogLevel;
  format: 'json' | 'simple';
  transports: ('console' | 'file')[];
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'http', 'debug'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Get logger configuration from server config or environment variables
 *
 * Priority:
 * 1. Provided logLevel parameter (from servefs.json)
 * 2. LOG_LEVEL environment variable
 * 3. Default: 'info'
 *
 * Environment variables:
 * - LOG_LEVEL: error | warn | info | http | debug
 * - LOG_FORMAT: json | simple (default: json)
 * - NODE_ENV: development | production | test
 */
export function getLoggerConfig(logLevel?: LogLevel, env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const level = logLevel ?? (isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : 'info');
  const format = env.LOG_FORMAT === 'simple' ? 'simple' : 'json';
  const nodeEnv = env.NODE_ENV || 'development';

  // In test mode, only use console transport with minimal logging
  if (nodeEnv === 'test') {
    return {
      level: 'error',
      format: 'simple',
      transports: ['console']
    };
  }

  return {
    level,
    format,
    transports: ['console', 'file']
  };
}

function createFormat(config: LoggerConfig): winston.Logform.Format {
  if (config.format === 'json') {
    return winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    );
  }

  return winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ level, message, timestamp, ...meta }) => {
      const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `${String(timestamp)} [${level.toUpperCase()}] ${String(message)}${metaStr}`;
    })
  );
}

function createTransports(config: LoggerConfig): winston.transport[] {
  const transports: winston.transport[] = [];

  if (config.transports.includes('console')) {
    transports.push(
      new winston.transports.Console({
        level: config.level
      })
    );
  }

  if (config.transports.includes('file')) {
    transports.push(
      new winston.transports.File({
        filename: 'logs/error.log',
        level: 'error'
      }),
      new winston.transports.File({
        filename: 'logs/combined.log',
        level: config.level
      })
    );
  }

  return transports;
}

let loggerInstance: winston.Logger | null = null;

/**
 * Initialize the global logger
 * Call this once at application startup
 */
export function initializeLogger(logLevel?: LogLevel): winston.Logger {
  const config = getLoggerConfig(logLevel);

  loggerInstance = winston.createLogger({
    level: config.level,
    format: createFormat(config),
    transports: createTransports(config),
    exitOnError: false
  });

  loggerInstance.info('Logger initialized', {
    level: config.level,
    format: config.format,
    transports: config.transports
  });

  return loggerInstance;
}

/**
 * Whether initializeLogger() has run
 */
export function isLoggerInitialized(): boolean {
  return loggerInstance !== null;
}

/**
 * Get the global logger instance
 * Throws if logger hasn't been initialized
 */
export function getLogger(): winston.Logger {
  if (!loggerInstance) {
    throw new Error('Logger not initialized. Call initializeLogger() first.');
  }
  return loggerInstance;
}

/**
 * Create a child logger with additional context
 *
 * @example
 * ```typescript
 * const logger = createChildLogger({ requestId: 'abc' });
 * logger.info('Serving file'); // includes requestId
 * ```
 */
export function createChildLogger(context: Record<string, unknown>): winston.Logger {
  return getLogger().child(context);
}

/**
 * Create a logger for a specific component (e.g. 'http', 'startup')
 */
export function createComponentLogger(component: string): winston.Logger {
  return createChildLogger({ component });
}
