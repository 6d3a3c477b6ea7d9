#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'path';
import { loadEnvironment } from '../config/environment';
import { TimesheetStorage } from '../services/TimesheetStorage';
import { DEFAULT_SKIP_SHEETS, ImportService } from '../services/ImportService';
import { formatMoney } from '../services/BillingService';
import { initializeLogger } from '../utils/log-config-loader';
import { banner } from '../app/views/table';
import { Logger } from '../utils/logger';

const program = new Command();

program
  .name('timesheet-import')
  .description('Import time entries and the hourly rate from a spreadsheet JSON export')
  .version('1.0.0')
  .argument('<json-file>', 'Workbook export: sheet -> cell -> { formula, value, type }')
  .option('--skip <sheets...>', 'Additional sheet names to skip')
  .option('--db <path>', 'Database file (overrides TIMESHEET_DB)')
  .action((jsonFile: string, options: { skip?: string[]; db?: string }) => {
    try {
      const env = loadEnvironment();
      if (env.loggingConfig) {
        Logger.initialize(env.loggingConfig);
      } else {
        initializeLogger();
      }

      const dbPath = options.db ? path.resolve(options.db) : env.dbPath;
      const storage = new TimesheetStorage(dbPath);
      const service = new ImportService(storage);
      const skip = [...DEFAULT_SKIP_SHEETS, ...(options.skip ?? [])];

      console.log();
      banner('Timesheet Import').forEach(line => console.log(line));
      console.log(chalk.white(`  Source:    ${path.resolve(jsonFile)}`));
      console.log(chalk.white(`  Database:  ${dbPath}`));

      const result = service.importFromJson(path.resolve(jsonFile), skip);

      if (result.hourlyRate !== null) {
        const currency = storage.getConfig().currency;
        console.log(chalk.green(`\n✓ Imported config: ${formatMoney(result.hourlyRate, currency)}/hr`));
      } else {
        console.log(chalk.yellow('\n⚠ No hourly rate found in Config!B1'));
      }

      result.sheets.forEach(sheet => {
        console.log(chalk.white(`  ${sheet.sheet.padEnd(25)} ${sheet.entries} entries`));
      });

      console.log(chalk.green(`\n✓ Total: ${result.totalEntries} entries imported`));
    } catch (error) {
      console.error(chalk.red('\n✗ Error:'), error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

program.parse(process.argv);
