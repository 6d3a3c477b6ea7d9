// src/tests/dateUtils.test.ts
import { addDays } from 'date-fns';
import {
  companyYearLabel,
  countWeekdays,
  fromIsoDate,
  getCompanyYear,
  getCompanyYearMonths,
  getWeekMonth,
  getWeekRange,
  getWeeksInMonth,
  getWeekStart,
  parseIsoDate,
  shiftMonth,
  toIsoDate,
} from '../utils/dateUtils';

describe('dateUtils', () => {
  describe('getWeekStart', () => {
    it('should return the Saturday on or before every date', () => {
      let d = new Date(2025, 0, 1);
      for (let i = 0; i < 400; i++) {
        const start = getWeekStart(d);
        expect(start.getDay()).toBe(6);
        expect(start.getTime()).toBeLessThanOrEqual(d.getTime());
        expect(addDays(start, 6).getTime()).toBeGreaterThanOrEqual(d.getTime());
        d = addDays(d, 1);
      }
    });

    it('should map a Saturday to itself', () => {
      expect(toIsoDate(getWeekStart(new Date(2025, 10, 29)))).toBe('2025-11-29');
    });

    it('should map a Friday to the previous Saturday', () => {
      expect(toIsoDate(getWeekStart(new Date(2025, 11, 5)))).toBe('2025-11-29');
    });

    it('should give a Saturday to Friday range', () => {
      const range = getWeekRange(new Date(2026, 0, 27));
      expect(toIsoDate(range.start)).toBe('2026-01-24');
      expect(toIsoDate(range.end)).toBe('2026-01-30');
    });
  });

  describe('getWeeksInMonth', () => {
    it('should list the weeks overlapping December 2025', () => {
      const weeks = getWeeksInMonth(2025, 12).map(w => [toIsoDate(w.start), toIsoDate(w.end)]);
      expect(weeks).toEqual([
        ['2025-11-29', '2025-12-05'],
        ['2025-12-06', '2025-12-12'],
        ['2025-12-13', '2025-12-19'],
        ['2025-12-20', '2025-12-26'],
        ['2025-12-27', '2026-01-02'],
      ]);
    });

    it('should produce contiguous 7-day windows covering every day of each month', () => {
      for (let year = 2024; year <= 2026; year++) {
        for (let month = 1; month <= 12; month++) {
          const weeks = getWeeksInMonth(year, month);

          weeks.forEach((week, i) => {
            expect(toIsoDate(addDays(week.start, 6))).toBe(toIsoDate(week.end));
            if (i > 0) {
              expect(toIsoDate(addDays(weeks[i - 1].end, 1))).toBe(toIsoDate(week.start));
            }
          });

          const first = toIsoDate(weeks[0].start);
          const last = toIsoDate(weeks[weeks.length - 1].end);
          expect(first <= toIsoDate(new Date(year, month - 1, 1))).toBe(true);
          expect(last >= toIsoDate(new Date(year, month, 0))).toBe(true);
        }
      }
    });
  });

  describe('countWeekdays', () => {
    it('should count Monday to Friday in an inclusive range', () => {
      expect(countWeekdays(new Date(2025, 10, 29), new Date(2025, 11, 5))).toBe(5);
      expect(countWeekdays(new Date(2025, 11, 1), new Date(2025, 11, 31))).toBe(23);
    });

    it('should only count days in the filter month', () => {
      // Sat Dec 27 2025 - Fri Jan 2 2026: Mon-Wed in December, Thu-Fri in January
      const start = new Date(2025, 11, 27);
      const end = new Date(2026, 0, 2);
      expect(countWeekdays(start, end, 12)).toBe(3);
      expect(countWeekdays(start, end, 1)).toBe(2);
    });

    it('should return zero for a reversed range', () => {
      expect(countWeekdays(new Date(2025, 11, 5), new Date(2025, 11, 1))).toBe(0);
    });
  });

  describe('getWeekMonth', () => {
    it('should pick the month holding most weekdays', () => {
      expect(getWeekMonth(new Date(2025, 11, 27), new Date(2026, 0, 2))).toEqual({ year: 2025, month: 12 });
      expect(getWeekMonth(new Date(2026, 0, 31), new Date(2026, 1, 6))).toEqual({ year: 2026, month: 2 });
    });
  });

  describe('months and company years', () => {
    it('should shift months across year boundaries', () => {
      expect(shiftMonth(2025, 12, 1)).toEqual({ year: 2026, month: 1 });
      expect(shiftMonth(2026, 1, -1)).toEqual({ year: 2025, month: 12 });
      expect(shiftMonth(2026, 3, -12)).toEqual({ year: 2025, month: 3 });
    });

    it('should start the company year in September', () => {
      expect(getCompanyYear(2025, 9)).toBe(2025);
      expect(getCompanyYear(2026, 8)).toBe(2025);
      expect(getCompanyYear(2026, 1)).toBe(2025);
    });

    it('should list September to August', () => {
      const months = getCompanyYearMonths(2025);
      expect(months).toHaveLength(12);
      expect(months[0]).toEqual({ year: 2025, month: 9 });
      expect(months[4]).toEqual({ year: 2026, month: 1 });
      expect(months[11]).toEqual({ year: 2026, month: 8 });
    });

    it('should label company years', () => {
      expect(companyYearLabel(2025)).toBe('2025/26');
      expect(companyYearLabel(2099)).toBe('2099/00');
    });
  });

  describe('parseIsoDate', () => {
    it('should parse yyyy-MM-dd as a local date', () => {
      const d = parseIsoDate('2026-01-27');
      expect(d?.getFullYear()).toBe(2026);
      expect(d?.getMonth()).toBe(0);
      expect(d?.getDate()).toBe(27);
    });

    it('should reject malformed and impossible dates', () => {
      expect(parseIsoDate('27/01/2026')).toBeNull();
      expect(parseIsoDate('2026-02-30')).toBeNull();
      expect(() => fromIsoDate('nope')).toThrow('Invalid date: nope');
    });
  });
});
