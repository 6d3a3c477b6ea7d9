// src/services/SummaryService.ts
import { Config, TimeEntry } from '../types/models';
import { TimesheetStorage } from './TimesheetStorage';
import { adjustedHours, roundHours, workedHours } from './hours';
import {
  countWeekdays,
  getCompanyYearMonths,
  getMonthBounds,
  getWeeksInMonth,
  toIsoDate,
  WeekRange,
  YearMonth,
} from '../utils/dateUtils';

export interface HoursBreakdown {
  worked: number;
  leave: number;
  sick: number;
  training: number;
  publicHoliday: number;
  total: number;
}

export interface PeriodSummary extends HoursBreakdown {
  weekdays: number;
  targetMax: number;   // weekdays x standard day, less public holidays
}

export interface WeekSummaryRow extends PeriodSummary {
  week: WeekRange;
}

export interface MonthSummary extends PeriodSummary {
  year: number;
  month: number;
  weeks: WeekSummaryRow[];
}

export interface YearSummary extends PeriodSummary {
  startYear: number;
  months: MonthSummary[];
}

export function emptyBreakdown(): HoursBreakdown {
  return { worked: 0, leave: 0, sick: 0, training: 0, publicHoliday: 0, total: 0 };
}

/**
 * Sum worked hours and adjustments by type
 */
export function breakdownEntries(entries: Iterable<TimeEntry>): HoursBreakdown {
  const totals = emptyBreakdown();

  for (const entry of entries) {
    totals.worked += workedHours(entry);

    const adjusted = adjustedHours(entry);
    if (!adjusted) continue;

    switch (entry.adjustType) {
      case 'L':
        totals.leave += adjusted;
        break;
      case 'S':
        totals.sick += adjusted;
        break;
      case 'T':
        totals.training += adjusted;
        break;
      case 'P':
        totals.publicHoliday += adjusted;
        break;
      default:
        break;
    }
  }

  return roundBreakdown({
    ...totals,
    total: totals.worked + totals.leave + totals.sick + totals.training + totals.publicHoliday,
  });
}

function roundBreakdown(b: HoursBreakdown): HoursBreakdown {
  return {
    worked: roundHours(b.worked),
    leave: roundHours(b.leave),
    sick: roundHours(b.sick),
    training: roundHours(b.training),
    publicHoliday: roundHours(b.publicHoliday),
    total: roundHours(b.total),
  };
}

export function addBreakdowns(a: HoursBreakdown, b: HoursBreakdown): HoursBreakdown {
  return roundBreakdown({
    worked: a.worked + b.worked,
    leave: a.leave + b.leave,
    sick: a.sick + b.sick,
    training: a.training + b.training,
    publicHoliday: a.publicHoliday + b.publicHoliday,
    total: a.total + b.total,
  });
}

export function targetMaxHours(weekdays: number, standardDayHours: number, publicHoliday: number): number {
  return roundHours(weekdays * standardDayHours - publicHoliday);
}

export function dayEquivalent(hours: number, standardDayHours: number): number {
  return standardDayHours ? roundHours(hours / standardDayHours) : 0;
}

export function percentOfTarget(worked: number, targetMax: number): number {
  return targetMax ? (worked / targetMax) * 100 : 0;
}

/**
 * Entries for days between start and end, inclusive
 */
function entriesInRange(entries: ReadonlyMap<string, TimeEntry>, start: Date, end: Date): TimeEntry[] {
  const startKey = toIsoDate(start);
  const endKey = toIsoDate(end);
  return [...entries.values()].filter(e => e.date >= startKey && e.date <= endKey);
}

/**
 * Totals for a full Saturday-Friday week, including days outside the displayed month
 */
export function summarizeWeek(
  week: WeekRange,
  entries: ReadonlyMap<string, TimeEntry>,
  config: Config
): WeekSummaryRow {
  const breakdown = breakdownEntries(entriesInRange(entries, week.start, week.end));
  const weekdays = countWeekdays(week.start, week.end);
  return {
    week,
    ...breakdown,
    weekdays,
    targetMax: targetMaxHours(weekdays, config.standardDayHours, breakdown.publicHoliday),
  };
}

/**
 * Month totals, and per-week rows restricted to the days inside the month
 */
export function summarizeMonth(
  year: number,
  month: number,
  entries: ReadonlyMap<string, TimeEntry>,
  config: Config
): MonthSummary {
  const bounds = getMonthBounds(year, month);

  const weeks = getWeeksInMonth(year, month).map(week => {
    const start = week.start < bounds.start ? bounds.start : week.start;
    const end = week.end > bounds.end ? bounds.end : week.end;
    const breakdown = breakdownEntries(entriesInRange(entries, start, end));
    const weekdays = countWeekdays(start, end, month);
    return {
      week,
      ...breakdown,
      weekdays,
      targetMax: targetMaxHours(weekdays, config.standardDayHours, breakdown.publicHoliday),
    };
  });

  const breakdown = weeks.reduce<HoursBreakdown>((acc, w) => addBreakdowns(acc, w), emptyBreakdown());
  const weekdays = countWeekdays(bounds.start, bounds.end);

  return {
    year,
    month,
    weeks,
    ...breakdown,
    weekdays,
    targetMax: targetMaxHours(weekdays, config.standardDayHours, breakdown.publicHoliday),
  };
}

export class SummaryService {
  constructor(private readonly storage: TimesheetStorage) {}

  getMonthSummary(year: number, month: number, config: Config): MonthSummary {
    const entries = new Map(this.storage.getMonthEntries(year, month).map(e => [e.date, e]));
    return summarizeMonth(year, month, entries, config);
  }

  /**
   * One row per month of the September-August company year starting in startYear
   */
  getYearSummary(startYear: number, config: Config): YearSummary {
    const months = getCompanyYearMonths(startYear)
      .map(({ year, month }: YearMonth) => this.getMonthSummary(year, month, config));

    const breakdown = months.reduce<HoursBreakdown>((acc, m) => addBreakdowns(acc, m), emptyBreakdown());
    const weekdays = months.reduce((sum, m) => sum + m.weekdays, 0);

    return {
      startYear,
      months,
      ...breakdown,
      weekdays,
      targetMax: targetMaxHours(weekdays, config.standardDayHours, breakdown.publicHoliday),
    };
  }
}
