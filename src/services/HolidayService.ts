// src/services/HolidayService.ts
import Holidays from 'date-holidays';
import { TimesheetStorage } from './TimesheetStorage';
import { emptyEntry, hoursToMinutes, isBlankEntry } from './hours';
import {
  daysInRange,
  getMonthBounds,
  isWeekday,
  toIsoDate,
} from '../utils/dateUtils';
import { Logger } from '../utils/logger';

const logger = new Logger('HolidayService');

export interface Holiday {
  date: string;   // yyyy-MM-dd
  name: string;
}

/**
 * Source of public holiday dates for a year
 */
export interface HolidayCalendar {
  getHolidays(year: number): Holiday[];
}

/**
 * England & Wales public and bank holidays
 */
export class EnglandHolidayCalendar implements HolidayCalendar {
  private readonly holidays = new Holidays('GB', 'ENG');
  private readonly cache = new Map<number, Holiday[]>();

  getHolidays(year: number): Holiday[] {
    const cached = this.cache.get(year);
    if (cached) return cached;

    const result = this.holidays.getHolidays(year)
      .filter(h => h.type === 'public' || h.type === 'bank')
      .map(h => ({ date: h.date.slice(0, 10), name: h.name }));

    this.cache.set(year, result);
    return result;
  }
}

export class HolidayService {
  constructor(
    private readonly storage: TimesheetStorage,
    private readonly calendar: HolidayCalendar = new EnglandHolidayCalendar()
  ) {}

  /**
   * Holidays falling on weekdays between two dates, inclusive
   */
  getHolidaysInRange(start: Date, end: Date): Holiday[] {
    const startKey = toIsoDate(start);
    const endKey = toIsoDate(end);
    const byDate = new Map<string, Holiday>();

    for (let year = start.getFullYear(); year <= end.getFullYear(); year++) {
      for (const holiday of this.calendar.getHolidays(year)) {
        if (holiday.date < startKey || holiday.date > endKey || byDate.has(holiday.date)) continue;
        byDate.set(holiday.date, holiday);
      }
    }

    return daysInRange(start, end)
      .filter(isWeekday)
      .map(d => byDate.get(toIsoDate(d)))
      .filter((h): h is Holiday => h !== undefined);
  }

  /**
   * Record a full public-holiday day for each weekday holiday in the month that has no
   * entry yet. Returns the number of entries created.
   */
  populateHolidays(year: number, month: number, standardDayHours: number): number {
    const { start, end } = getMonthBounds(year, month);
    let created = 0;

    for (const holiday of this.getHolidaysInRange(start, end)) {
      const existing = this.storage.getEntry(holiday.date);
      if (existing && !isBlankEntry(existing)) {
        logger.debug(`Skipping ${holiday.date}: entry already recorded`);
        continue;
      }

      this.storage.saveEntry({
        ...emptyEntry(holiday.date),
        adjustmentMinutes: hoursToMinutes(standardDayHours),
        adjustType: 'P',
        comment: holiday.name,
      });
      created++;
    }

    logger.info(`Populated ${created} holiday(s) for ${year}-${String(month).padStart(2, '0')}`);
    return created;
  }
}
