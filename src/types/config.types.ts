// src/types/config.types.ts

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggingProfile {
  appendTimestamp: boolean;
  timestampFormat: string;
  logLevel: LogLevel;
  enableWarningLog: boolean;
  enableConsole?: boolean;   // defaults to true
  logDirectory?: string;     // empty string disables file logs
  silent?: boolean;
}

export interface LoggingConfig {
  profile?: string;
  profiles?: Record<string, LoggingProfile>;

  // Direct configuration, used when no profile is named
  appendTimestamp?: boolean;
  timestampFormat?: string;
  logLevel?: LogLevel;
  enableWarningLog?: boolean;
  enableConsole?: boolean;
  logDirectory?: string;
}

export interface AppEnvironment {
  dbPath: string;
  logLevel: LogLevel;
  loggingConfig?: LoggingConfig;
}
