// src/tests/SummaryService.test.ts
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  dayEquivalent,
  percentOfTarget,
  summarizeMonth,
  summarizeWeek,
  SummaryService,
} from '../services/SummaryService';
import { TimesheetStorage } from '../services/TimesheetStorage';
import { emptyEntry } from '../services/hours';
import { DEFAULT_CONFIG, TimeEntry } from '../types/models';
import { getWeekRange, toIsoDate } from '../utils/dateUtils';

function worked(date: string, clockIn = '09:00', clockOut = '17:00', lunchMinutes: number | null = 30): TimeEntry {
  return { ...emptyEntry(date), clockIn, clockOut, lunchMinutes };
}

function adjusted(date: string, minutes: number, type: TimeEntry['adjustType']): TimeEntry {
  return { ...emptyEntry(date), adjustmentMinutes: minutes, adjustType: type };
}

function toMap(entries: TimeEntry[]): Map<string, TimeEntry> {
  return new Map(entries.map(e => [e.date, e]));
}

// Sat Jan 24 - Fri Jan 30 2026
const WEEK_ENTRIES: TimeEntry[] = [
  worked('2026-01-27'),
  adjusted('2026-01-28', 450, 'L'),
  { ...worked('2026-01-29', '09:00', '12:30', null), adjustmentMinutes: 240, adjustType: 'S' },
  adjusted('2026-01-30', 450, 'P'),
];

describe('SummaryService', () => {
  describe('summarizeWeek', () => {
    it('should break down hours by type and reduce the target by public holidays', () => {
      const summary = summarizeWeek(getWeekRange(new Date(2026, 0, 27)), toMap(WEEK_ENTRIES), DEFAULT_CONFIG);

      expect(summary).toMatchObject({
        worked: 11,
        leave: 7.5,
        sick: 4,
        training: 0,
        publicHoliday: 7.5,
        total: 30,
        weekdays: 5,
        targetMax: 30,
      });
    });

    it('should include days of the week outside the month', () => {
      const entries = toMap([worked('2025-12-31'), worked('2026-01-02')]);
      const summary = summarizeWeek(getWeekRange(new Date(2026, 0, 2)), entries, DEFAULT_CONFIG);

      expect(summary.worked).toBe(15);
      expect(summary.weekdays).toBe(5);
    });
  });

  describe('summarizeMonth', () => {
    const entries = toMap([worked('2025-12-31'), worked('2026-01-02'), ...WEEK_ENTRIES]);
    const summary = summarizeMonth(2026, 1, entries, DEFAULT_CONFIG);

    it('should have one row per overlapping week', () => {
      expect(summary.weeks.map(w => toIsoDate(w.week.start))).toEqual([
        '2025-12-27',
        '2026-01-03',
        '2026-01-10',
        '2026-01-17',
        '2026-01-24',
        '2026-01-31',
      ]);
    });

    it('should clip week rows to the month', () => {
      const [first] = summary.weeks;
      expect(first.worked).toBe(7.5);
      expect(first.weekdays).toBe(2);
      expect(first.targetMax).toBe(15);

      const last = summary.weeks[summary.weeks.length - 1];
      expect(last.weekdays).toBe(0);
      expect(last.total).toBe(0);
    });

    it('should total the month', () => {
      expect(summary).toMatchObject({
        year: 2026,
        month: 1,
        worked: 18.5,
        leave: 7.5,
        sick: 4,
        publicHoliday: 7.5,
        total: 37.5,
        weekdays: 22,
        targetMax: 157.5,
      });
    });
  });

  describe('helpers', () => {
    it('should express hours as standard days', () => {
      expect(dayEquivalent(15, 7.5)).toBe(2);
      expect(dayEquivalent(11, 7.5)).toBe(1.47);
      expect(dayEquivalent(5, 0)).toBe(0);
    });

    it('should give a percentage of the target', () => {
      expect(percentOfTarget(15, 30)).toBe(50);
      expect(percentOfTarget(5, 0)).toBe(0);
    });
  });

  describe('getYearSummary', () => {
    let tmpDir: string;
    let storage: TimesheetStorage;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'timesheet-summary-'));
      storage = new TimesheetStorage(path.join(tmpDir, 'timesheet.db'));
      storage.initDb();
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should cover September to August', () => {
      storage.saveEntry(adjusted('2025-09-01', 450, 'L'));
      storage.saveEntry(worked('2026-01-27'));
      storage.saveEntry(worked('2026-09-01'));

      const year = new SummaryService(storage).getYearSummary(2025, DEFAULT_CONFIG);

      expect(year.months.map(m => `${m.year}-${m.month}`)).toEqual([
        '2025-9', '2025-10', '2025-11', '2025-12',
        '2026-1', '2026-2', '2026-3', '2026-4', '2026-5', '2026-6', '2026-7', '2026-8',
      ]);
      expect(year.months[0]).toMatchObject({ leave: 7.5, weekdays: 22 });
      expect(year.months[4].worked).toBe(7.5);
      expect(year).toMatchObject({ startYear: 2025, worked: 7.5, leave: 7.5, total: 15 });
    });
  });
});
