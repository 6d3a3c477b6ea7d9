// src/utils/log-config-loader.ts
import * as fs from 'fs';
import * as path from 'path';
import { LoggingConfig } from '../types/config.types';
import { Logger } from './logger';
import { parseLoggingConfig } from '../config/environment';

/**
 * Load logging configuration from config/log-config.json in the working directory.
 * Falls back to the configuration passed in when the file is missing or unreadable.
 */
export function loadLoggingConfig(fallbackConfig?: LoggingConfig, baseDir: string = process.cwd()): LoggingConfig | undefined {
  const logConfigPath = path.join(baseDir, 'config', 'log-config.json');

  try {
    if (fs.existsSync(logConfigPath)) {
      const configContent = fs.readFileSync(logConfigPath, 'utf-8');
      const loaded = parseLoggingConfig(configContent);
      if (loaded) return loaded;
      console.warn(`Ignoring invalid logging configuration in ${logConfigPath}`);
    }
  } catch (error) {
    console.warn(`Failed to load log-config.json: ${error}`);
  }

  return fallbackConfig;
}

/**
 * Initialize logger with the centralized config or the fallback.
 * Called at the start of each CLI command.
 */
export function initializeLogger(fallbackConfig?: LoggingConfig): void {
  const loggingConfig = loadLoggingConfig(fallbackConfig);

  if (loggingConfig) {
    Logger.initialize(loggingConfig);

    const logger = new Logger('LogConfigLoader');
    logger.debug(`Initialized logger with profile: ${loggingConfig.profile || 'default'}`);
  }
}
