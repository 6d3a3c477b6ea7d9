// src/services/ImportService.ts
import * as fs from 'fs';
import { z } from 'zod';
import { isAdjustType, TimeEntry } from '../types/models';
import { TimesheetStorage } from './TimesheetStorage';
import { parseIsoDate, toIsoDate } from '../utils/dateUtils';
import { Logger } from '../utils/logger';
import { Validators } from '../utils/validation';

const logger = new Logger('ImportService');

export const DEFAULT_SKIP_SHEETS: readonly string[] = ['Config', 'Sick 2012-13', 'Summary 2012-13'];

const DAY_LABELS = new Set(['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun']);

const cellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const cellSchema = z.object({
  formula: z.string().nullable().optional(),
  value: cellValueSchema.optional(),
  type: z.string().optional(),
});

const sheetSchema = z.record(z.string(), cellSchema);

export const workbookSchema = z.record(z.string(), sheetSchema);

export type CellValue = z.infer<typeof cellValueSchema>;
export type Sheet = z.infer<typeof sheetSchema>;
export type Workbook = z.infer<typeof workbookSchema>;

export interface SheetImportResult {
  sheet: string;
  entries: number;
}

export interface ImportResult {
  hourlyRate: number | null;
  sheets: SheetImportResult[];
  totalEntries: number;
}

const TIME_PATTERN = /(\d{1,2}):(\d{2})(?::\d{2})?$/;

/**
 * A clock time from a cell such as '09:15:00'. Midnight means an empty cell.
 */
export function parseTimeValue(value: CellValue | undefined): string | null {
  if (typeof value !== 'string') return null;

  const match = TIME_PATTERN.exec(value.trim());
  if (!match) return null;

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if ((hours === 0 && minutes === 0) || hours > 23 || minutes > 59) return null;

  return `${String(hours).padStart(2, '0')}:${match[2]}`;
}

/**
 * A duration in whole minutes from a cell such as '00:30:00' or '7:30:00'. Zero means empty.
 */
export function parseDuration(value: CellValue | undefined): number | null {
  if (typeof value !== 'string') return null;

  const match = /^(\d+):(\d{2})(?::\d{2})?$/.exec(value.trim());
  if (!match) return null;

  const minutes = Number(match[1]) * 60 + Number(match[2]);
  return minutes === 0 ? null : minutes;
}

/**
 * The date part of a cell such as '2025-08-30 00:00:00', as yyyy-MM-dd
 */
export function parseDate(value: CellValue | undefined): string | null {
  if (typeof value !== 'string' || !value) return null;

  const parsed = parseIsoDate(value.trim().split(' ')[0]);
  return parsed ? toIsoDate(parsed) : null;
}

function splitCellRef(ref: string): { column: string; row: number } | null {
  const match = /^([A-Z]+)(\d+)$/.exec(ref);
  return match ? { column: match[1], row: Number(match[2]) } : null;
}

/**
 * Time entries from one monthly sheet. Columns: A day, B date, C in, D lunch, E out,
 * H adjustment, J adjust type, K comment. Row 1 is the header.
 */
export function importSheet(sheet: Sheet): TimeEntry[] {
  const rows = new Map<number, Map<string, CellValue | undefined>>();

  for (const [ref, cell] of Object.entries(sheet)) {
    const position = splitCellRef(ref);
    if (!position || position.row === 1) continue;

    let row = rows.get(position.row);
    if (!row) {
      row = new Map();
      rows.set(position.row, row);
    }
    row.set(position.column, cell.value);
  }

  const entries: TimeEntry[] = [];

  for (const [rowNumber, row] of [...rows.entries()].sort(([a], [b]) => a - b)) {
    const date = parseDate(row.get('B'));
    if (!date) continue;

    // summary rows carry no day label
    const dayOfWeek = row.get('A');
    if (typeof dayOfWeek !== 'string' || !DAY_LABELS.has(dayOfWeek)) continue;

    const rawType = row.get('J');
    const adjustType = typeof rawType === 'string' ? rawType.trim().toUpperCase() : '';
    if (adjustType && !isAdjustType(adjustType)) {
      logger.warn(`Row ${rowNumber}: ignoring unknown adjust type '${adjustType}'`);
    }

    const comment = row.get('K');

    entries.push({
      date,
      dayOfWeek,
      clockIn: parseTimeValue(row.get('C')),
      lunchMinutes: parseDuration(row.get('D')),
      clockOut: parseTimeValue(row.get('E')),
      adjustmentMinutes: parseDuration(row.get('H')),
      adjustType: isAdjustType(adjustType) ? adjustType : null,
      comment: comment === null || comment === undefined || comment === '' ? null : String(comment),
    });
  }

  return entries;
}

export function parseWorkbook(raw: unknown): Workbook {
  const parsed = workbookSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid workbook JSON at ${issue.path.join('.') || '<root>'}: ${issue.message}`);
  }
  return parsed.data;
}

export class ImportService {
  constructor(private readonly storage: TimesheetStorage) {}

  /**
   * Import the hourly rate from Config!B1 and entries from every other sheet.
   * Only the rate is merged into the stored config; currency, VAT and day length are left unchanged.
   */
  importWorkbook(workbook: Workbook, skipSheets: readonly string[] = DEFAULT_SKIP_SHEETS): ImportResult {
    this.storage.initDb();

    const hourlyRate = this.importConfig(workbook);
    const skip = new Set(skipSheets);
    const sheets: SheetImportResult[] = [];

    for (const [name, sheet] of Object.entries(workbook)) {
      if (skip.has(name)) {
        logger.debug(`Skipping sheet ${name}`);
        continue;
      }

      const entries = importSheet(sheet);
      for (const entry of entries) {
        this.storage.saveEntry(entry);
      }

      logger.info(`Imported ${entries.length} entries from ${name}`);
      sheets.push({ sheet: name, entries: entries.length });
    }

    const totalEntries = sheets.reduce((sum, s) => sum + s.entries, 0);
    logger.info(`Import complete: ${totalEntries} entries from ${sheets.length} sheet(s)`);
    return { hourlyRate, sheets, totalEntries };
  }

  importFromJson(jsonPath: string, skipSheets: readonly string[] = DEFAULT_SKIP_SHEETS): ImportResult {
    if (!fs.existsSync(jsonPath)) {
      throw new Error(`File not found: ${jsonPath}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(jsonPath, 'utf-8'));
    } catch (error) {
      throw new Error(`Could not parse ${jsonPath}: ${error instanceof Error ? error.message : String(error)}`);
    }

    return this.importWorkbook(parseWorkbook(raw), skipSheets);
  }

  private importConfig(workbook: Workbook): number | null {
    const cell = workbook['Config']?.['B1'];
    if (!cell) {
      logger.warn('No Config!B1 cell; hourly rate left unchanged');
      return null;
    }

    const value = cell.value;
    const rate = typeof value === 'number' ? value
      : typeof value === 'string' && Validators.isNumeric(value) ? Number(value)
      : null;
    if (rate === null || !Number.isFinite(rate)) {
      logger.warn(`Config!B1 is not a number: ${String(value)}`);
      return null;
    }

    this.storage.saveConfig({ ...this.storage.getConfig(), hourlyRate: rate });
    logger.info(`Imported hourly rate ${rate}`);
    return rate;
  }
}
