#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { format } from 'date-fns';
import { loadEnvironment } from '../config/environment';
import { DatabaseInfo, TimesheetStorage } from '../services/TimesheetStorage';
import { TimesheetApp } from '../app/TimesheetApp';
import { InquirerPrompter } from '../app/prompts';
import { banner } from '../app/views/table';
import { initializeLogger } from '../utils/log-config-loader';
import { Logger } from '../utils/logger';

const program = new Command();

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function databaseInfoLines(info: DatabaseInfo): string[] {
  const lines = [`  Path:      ${info.path}`];
  if (!info.exists) {
    lines.push('  Status:    not created yet');
    return lines;
  }
  if (info.modified) {
    lines.push(`  Modified:  ${format(info.modified, 'yyyy-MM-dd HH:mm:ss')}`);
  }
  if (info.sizeBytes !== undefined) {
    lines.push(`  Size:      ${formatSize(info.sizeBytes)} (${info.sizeBytes} bytes)`);
  }
  return lines;
}

program
  .name('timesheet')
  .description('Record clock times, adjustments and ticket allocations in the terminal')
  .version('1.0.0')
  .option('--info', 'Show the database location, modification time and size, then exit')
  .action(async (options: { info?: boolean }) => {
    try {
      const env = loadEnvironment();
      const storage = new TimesheetStorage(env.dbPath);

      if (options.info) {
        console.log();
        banner('Timesheet Database').forEach(line => console.log(line));
        databaseInfoLines(storage.getDatabaseInfo()).forEach(line => console.log(chalk.white(line)));
        return;
      }

      // the UI owns the terminal, so logs go to file only
      if (env.loggingConfig) {
        Logger.initialize(env.loggingConfig);
      } else {
        initializeLogger({ profile: 'Interactive' });
      }
      if (process.env.LOG_LEVEL) {
        new Logger('timesheet').setLevel(env.logLevel);
      }

      const app = new TimesheetApp(storage, new InquirerPrompter());
      await app.run();
      console.log(chalk.green('\n✓ Goodbye'));
    } catch (error) {
      console.error(chalk.red('\n✗ Error:'), error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

if (require.main === module) {
  program.parseAsync(process.argv).catch(error => {
    console.error(chalk.red('\n✗ Error:'), error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
