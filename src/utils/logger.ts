// src/utils/logger.ts
import * as winston from 'winston';
import { createLogger } from './configurable-logger';
import { LoggingConfig, LogLevel } from '../types/config.types';
import { parseLoggingConfig } from '../config/environment';

// Logging config may be handed over through the environment
let loggingConfig: LoggingConfig | undefined;

if (process.env.LOGGING_CONFIG) {
  loggingConfig = parseLoggingConfig(process.env.LOGGING_CONFIG);
  if (!loggingConfig) {
    console.warn('Failed to parse LOGGING_CONFIG from environment');
  }
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Console-only configuration used until Logger.initialize runs
 */
export function bootstrapLoggingConfig(level: string | undefined): LoggingConfig {
  return { logLevel: isLogLevel(level) ? level : 'info', logDirectory: '' };
}

const logger: winston.Logger = createLogger(
  loggingConfig ?? bootstrapLoggingConfig(process.env.LOG_LEVEL)
);

export default logger;
export { logger };

// Wrapper class for consistent logging interface
export class Logger {
  private context: string;

  constructor(context: string) {
    this.context = context;
  }

  /**
   * Re-initialize the shared logger with a configuration.
   * Call this at application startup, before the first screen is drawn.
   */
  static initialize(config: LoggingConfig): void {
    const newLogger = createLogger(config);

    // Swap transports in place so module-level references stay valid
    logger.clear();
    newLogger.transports.forEach(transport => {
      logger.add(transport);
    });

    logger.level = newLogger.level;
    logger.silent = newLogger.silent;
  }

  info(message: string): void {
    logger.info(`[${this.context}] ${message}`);
  }

  warn(message: string): void {
    logger.warn(`[${this.context}] ${message}`);
  }

  error(message: string, error?: unknown): void {
    if (error) {
      const detail = error instanceof Error ? error.message : String(error);
      logger.error(`[${this.context}] ${message}: ${detail}`);
    } else {
      logger.error(`[${this.context}] ${message}`);
    }
  }

  debug(message: string): void {
    logger.debug(`[${this.context}] ${message}`);
  }

  setLevel(level: LogLevel): void {
    logger.level = level;
  }
}
