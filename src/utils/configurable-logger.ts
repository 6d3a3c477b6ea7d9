// src/utils/configurable-logger.ts
import * as winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { LoggingConfig, LoggingProfile } from '../types/config.types';

// Default logging profiles
const DEFAULT_PROFILES: Record<string, LoggingProfile> = {
  Default: {
    appendTimestamp: false,
    timestampFormat: '',
    logLevel: 'info',
    enableWarningLog: true,
    logDirectory: 'logs'
  },
  AppendDatetime: {
    appendTimestamp: true,
    timestampFormat: 'YYYY-MM-DD-HHmmss',
    logLevel: 'info',
    enableWarningLog: true,
    logDirectory: 'logs'
  },
  Interactive: {
    appendTimestamp: false,
    timestampFormat: '',
    logLevel: 'info',
    enableWarningLog: false,
    enableConsole: false,
    logDirectory: 'logs'
  },
  Silent: {
    appendTimestamp: false,
    timestampFormat: '',
    logLevel: 'error',
    enableWarningLog: false,
    enableConsole: false,
    logDirectory: '',
    silent: true
  }
};

const lineFormat = winston.format.printf(({ level, message, timestamp, stack }) => {
  return `${timestamp} [${level}]: ${message}${stack ? `\n${stack}` : ''}`;
});

export class ConfigurableLogger {
  /**
   * Build a winston logger from a logging config (or the Default profile)
   */
  static initialize(config?: LoggingConfig): winston.Logger {
    const effectiveConfig = this.resolveConfig(config);

    const logger = winston.createLogger({
      level: effectiveConfig.logLevel,
      silent: effectiveConfig.silent === true,
      format: winston.format.combine(
        winston.format.timestamp({
          format: 'YYYY-MM-DD HH:mm:ss'
        }),
        winston.format.errors({ stack: true })
      )
    });

    if (effectiveConfig.enableConsole !== false) {
      logger.add(new winston.transports.Console({
        format: winston.format.combine(winston.format.colorize(), lineFormat)
      }));
    }

    const logsDir = this.prepareLogDirectory(effectiveConfig);
    if (logsDir) {
      logger.add(new winston.transports.File({
        filename: path.join(logsDir, this.generateLogFilename('combined.log', effectiveConfig)),
        format: lineFormat
      }));

      logger.add(new winston.transports.File({
        filename: path.join(logsDir, this.generateLogFilename('error.log', effectiveConfig)),
        level: 'error',
        format: lineFormat
      }));

      if (effectiveConfig.enableWarningLog) {
        logger.add(new winston.transports.File({
          filename: path.join(logsDir, this.generateLogFilename('warning.log', effectiveConfig)),
          level: 'warn',
          format: lineFormat
        }));
      }
    }

    return logger;
  }

  /**
   * Resolve the effective logging profile
   */
  static resolveConfig(config?: LoggingConfig): LoggingProfile {
    if (!config) {
      return DEFAULT_PROFILES.Default;
    }

    if (config.profile) {
      const custom = config.profiles?.[config.profile];
      if (custom) {
        return custom;
      }
      const builtIn = DEFAULT_PROFILES[config.profile];
      if (builtIn) {
        return builtIn;
      }
      console.warn(`Logging profile '${config.profile}' not found, using Default`);
      return DEFAULT_PROFILES.Default;
    }

    if (config.appendTimestamp !== undefined || config.logLevel !== undefined) {
      return {
        appendTimestamp: config.appendTimestamp ?? false,
        timestampFormat: config.timestampFormat || 'YYYY-MM-DD-HHmmss',
        logLevel: config.logLevel || 'info',
        enableWarningLog: config.enableWarningLog !== false,
        enableConsole: config.enableConsole,
        logDirectory: config.logDirectory ?? 'logs'
      };
    }

    return DEFAULT_PROFILES.Default;
  }

  private static prepareLogDirectory(config: LoggingProfile): string | null {
    if (!config.logDirectory || config.silent) {
      return null;
    }

    const logsDir = path.resolve(process.cwd(), config.logDirectory);
    try {
      if (!fs.existsSync(logsDir)) {
        fs.mkdirSync(logsDir, { recursive: true });
      }
      return logsDir;
    } catch (error) {
      console.warn(`Could not create logs directory ${logsDir}, file logging disabled`);
      return null;
    }
  }

  /**
   * Generate log filename, optionally suffixed with the start time
   */
  static generateLogFilename(baseName: string, config: LoggingProfile, now: Date = new Date()): string {
    if (!config.appendTimestamp) {
      return baseName;
    }

    let timestamp: string;
    if (config.timestampFormat === 'YYYY-MM-DD-HHmmss') {
      const year = now.getFullYear();
      const month = String(now.getMonth() + 1).padStart(2, '0');
      const day = String(now.getDate()).padStart(2, '0');
      const hours = String(now.getHours()).padStart(2, '0');
      const minutes = String(now.getMinutes()).padStart(2, '0');
      const seconds = String(now.getSeconds()).padStart(2, '0');
      timestamp = `${year}-${month}-${day}-${hours}${minutes}${seconds}`;
    } else {
      timestamp = now.toISOString().replace(/[:.]/g, '-').slice(0, -5);
    }

    const ext = path.extname(baseName);
    const name = path.basename(baseName, ext);

    return `${name}-${timestamp}${ext}`;
  }
}

export function createLogger(config?: LoggingConfig): winston.Logger {
  return ConfigurableLogger.initialize(config);
}
