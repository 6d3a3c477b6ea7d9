// src/utils/dateUtils.ts
import {
  addDays,
  addMonths,
  eachDayOfInterval,
  endOfMonth,
  format,
  isValid,
  isWeekend,
  parse,
  startOfMonth,
  startOfWeek,
} from 'date-fns';

export interface WeekRange {
  start: Date;   // Saturday
  end: Date;     // Friday
}

export interface YearMonth {
  year: number;
  month: number;   // 1-12
}

// Weeks run Saturday to Friday
const WEEK_STARTS_ON = 6;

// First month of the company reporting year (September)
export const COMPANY_YEAR_START_MONTH = 9;

export function toIsoDate(d: Date): string {
  return format(d, 'yyyy-MM-dd');
}

/**
 * Parse a yyyy-MM-dd string as a local date, or null when malformed
 */
export function parseIsoDate(value: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return null;
  }
  const parsed = parse(value, 'yyyy-MM-dd', new Date());
  return isValid(parsed) ? parsed : null;
}

export function fromIsoDate(value: string): Date {
  const parsed = parseIsoDate(value);
  if (!parsed) {
    throw new Error(`Invalid date: ${value}`);
  }
  return parsed;
}

export function dayLabel(d: Date): string {
  return format(d, 'EEE');
}

export function isWeekday(d: Date): boolean {
  return !isWeekend(d);
}

/**
 * The Saturday on or before d
 */
export function getWeekStart(d: Date): Date {
  return startOfWeek(d, { weekStartsOn: WEEK_STARTS_ON });
}

export function getWeekRange(d: Date): WeekRange {
  const start = getWeekStart(d);
  return { start, end: addDays(start, 6) };
}

export function getMonthBounds(year: number, month: number): WeekRange {
  const first = new Date(year, month - 1, 1);
  return { start: startOfMonth(first), end: endOfMonth(first) };
}

/**
 * Saturday-to-Friday weeks overlapping a calendar month, in order
 */
export function getWeeksInMonth(year: number, month: number): WeekRange[] {
  const { start: firstDay, end: lastDay } = getMonthBounds(year, month);
  const lastKey = toIsoDate(lastDay);

  const weeks: WeekRange[] = [];
  let weekStart = getWeekStart(firstDay);

  while (toIsoDate(weekStart) <= lastKey) {
    weeks.push({ start: weekStart, end: addDays(weekStart, 6) });
    weekStart = addDays(weekStart, 7);
  }

  return weeks;
}

export function daysInRange(start: Date, end: Date): Date[] {
  if (start > end) {
    return [];
  }
  return eachDayOfInterval({ start, end });
}

/**
 * Count Mon-Fri days in an inclusive range, optionally only those in filterMonth (1-12)
 */
export function countWeekdays(start: Date, end: Date, filterMonth?: number): number {
  return daysInRange(start, end).filter(d =>
    isWeekday(d) && (filterMonth === undefined || d.getMonth() + 1 === filterMonth)
  ).length;
}

/**
 * The month holding the majority of a week's weekdays
 */
export function getWeekMonth(weekStart: Date, weekEnd: Date): YearMonth {
  const counts = new Map<string, { ym: YearMonth; count: number }>();

  for (const d of daysInRange(weekStart, weekEnd)) {
    if (!isWeekday(d)) continue;
    const key = format(d, 'yyyy-MM');
    const current = counts.get(key);
    if (current) {
      current.count++;
    } else {
      counts.set(key, { ym: { year: d.getFullYear(), month: d.getMonth() + 1 }, count: 1 });
    }
  }

  let best: { ym: YearMonth; count: number } | undefined;
  for (const candidate of counts.values()) {
    if (!best || candidate.count > best.count) {
      best = candidate;
    }
  }

  return best ? best.ym : { year: weekStart.getFullYear(), month: weekStart.getMonth() + 1 };
}

export function shiftMonth(year: number, month: number, delta: number): YearMonth {
  const shifted = addMonths(new Date(year, month - 1, 1), delta);
  return { year: shifted.getFullYear(), month: shifted.getMonth() + 1 };
}

/**
 * Start year of the September-August company year containing (year, month)
 */
export function getCompanyYear(year: number, month: number): number {
  return month >= COMPANY_YEAR_START_MONTH ? year : year - 1;
}

export function getCompanyYearMonths(startYear: number): YearMonth[] {
  return Array.from({ length: 12 }, (_, i) => shiftMonth(startYear, COMPANY_YEAR_START_MONTH, i));
}

export function companyYearLabel(startYear: number): string {
  return `${startYear}/${String((startYear + 1) % 100).padStart(2, '0')}`;
}

export function monthLabel(year: number, month: number): string {
  return format(new Date(year, month - 1, 1), 'MMMM yyyy');
}

export function shortDate(d: Date): string {
  return format(d, 'MMM dd');
}
