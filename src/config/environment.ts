// src/config/environment.ts
import dotenv from 'dotenv';
import * as path from 'path';
import { z } from 'zod';
import { AppEnvironment, LoggingConfig } from '../types/config.types';

export const DEFAULT_DB_PATH = path.resolve(__dirname, '..', '..', 'data', 'timesheet.db');

const environmentSchema = z.object({
  TIMESHEET_DB: z.string().trim().optional(),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOGGING_CONFIG: z.string().optional()
});

const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

const loggingProfileSchema = z.object({
  appendTimestamp: z.boolean(),
  timestampFormat: z.string(),
  logLevel: logLevelSchema,
  enableWarningLog: z.boolean(),
  enableConsole: z.boolean().optional(),
  logDirectory: z.string().optional(),
  silent: z.boolean().optional()
});

const loggingConfigSchema = z.object({
  profile: z.string().optional(),
  profiles: z.record(loggingProfileSchema).optional(),
  logLevel: logLevelSchema.optional(),
  appendTimestamp: z.boolean().optional(),
  timestampFormat: z.string().optional(),
  enableWarningLog: z.boolean().optional(),
  enableConsole: z.boolean().optional(),
  logDirectory: z.string().optional()
});

/**
 * Parse a JSON logging configuration, or undefined when it is not one
 */
export function parseLoggingConfig(text: string): LoggingConfig | undefined {
  const result = loggingConfigSchema.safeParse(safeJson(text));
  return result.success ? result.data : undefined;
}

let dotenvLoaded = false;

/**
 * Load .env once and parse the variables the application reads
 */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): AppEnvironment {
  if (!dotenvLoaded && env === process.env) {
    dotenv.config();
    dotenvLoaded = true;
  }

  const parsed = environmentSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid environment variable ${issue.path.join('.')}: ${issue.message}`);
  }

  let loggingConfig: AppEnvironment['loggingConfig'];
  if (parsed.data.LOGGING_CONFIG) {
    loggingConfig = parseLoggingConfig(parsed.data.LOGGING_CONFIG);
    if (!loggingConfig) {
      throw new Error('Invalid LOGGING_CONFIG: expected a JSON logging configuration');
    }
  }

  return {
    dbPath: getDbPath(env),
    logLevel: parsed.data.LOG_LEVEL,
    loggingConfig
  };
}

/**
 * Database location: TIMESHEET_DB when set, otherwise data/timesheet.db in the project
 */
export function getDbPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.TIMESHEET_DB?.trim();
  return override ? path.resolve(override) : DEFAULT_DB_PATH;
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
