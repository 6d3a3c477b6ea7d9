// src/tests/HolidayService.test.ts
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { EnglandHolidayCalendar, Holiday, HolidayCalendar, HolidayService } from '../services/HolidayService';
import { TimesheetStorage } from '../services/TimesheetStorage';
import { emptyEntry } from '../services/hours';

class FixedCalendar implements HolidayCalendar {
  constructor(private readonly holidays: Holiday[]) {}

  getHolidays(year: number): Holiday[] {
    return this.holidays.filter(h => h.date.startsWith(`${year}-`));
  }
}

const MAY_2026: Holiday[] = [
  { date: '2026-05-02', name: 'Weekend holiday' },
  { date: '2026-05-04', name: 'Early May bank holiday' },
  { date: '2026-05-25', name: 'Spring bank holiday' },
];

describe('HolidayService', () => {
  let tmpDir: string;
  let storage: TimesheetStorage;
  let service: HolidayService;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'timesheet-holidays-'));
    storage = new TimesheetStorage(path.join(tmpDir, 'timesheet.db'));
    storage.initDb();
    service = new HolidayService(storage, new FixedCalendar(MAY_2026));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('getHolidaysInRange', () => {
    it('should return weekday holidays in date order', () => {
      const holidays = service.getHolidaysInRange(new Date(2026, 4, 1), new Date(2026, 4, 31));
      expect(holidays.map(h => h.date)).toEqual(['2026-05-04', '2026-05-25']);
    });

    it('should respect the range bounds', () => {
      const holidays = service.getHolidaysInRange(new Date(2026, 4, 5), new Date(2026, 4, 25));
      expect(holidays.map(h => h.date)).toEqual(['2026-05-25']);
    });
  });

  describe('populateHolidays', () => {
    it('should create a full public-holiday entry for each weekday holiday', () => {
      expect(service.populateHolidays(2026, 5, 7.5)).toBe(2);

      expect(storage.getEntry('2026-05-04')).toEqual({
        ...emptyEntry('2026-05-04'),
        adjustmentMinutes: 450,
        adjustType: 'P',
        comment: 'Early May bank holiday',
      });
      expect(storage.getEntry('2026-05-02')).toBeNull();
    });

    it('should add nothing on a second run', () => {
      service.populateHolidays(2026, 5, 7.5);
      expect(service.populateHolidays(2026, 5, 7.5)).toBe(0);
    });

    it('should keep entries the user already recorded', () => {
      const worked = { ...emptyEntry('2026-05-04'), clockIn: '09:00', clockOut: '13:00' };
      storage.saveEntry(worked);

      expect(service.populateHolidays(2026, 5, 7.5)).toBe(1);
      expect(storage.getEntry('2026-05-04')).toEqual(worked);
    });

    it('should fill a date whose entry holds only a comment', () => {
      storage.saveEntry({ ...emptyEntry('2026-05-25'), comment: 'note' });

      expect(service.populateHolidays(2026, 5, 8)).toBe(2);
      expect(storage.getEntry('2026-05-25')?.adjustmentMinutes).toBe(480);
      expect(storage.getEntry('2026-05-25')?.comment).toBe('Spring bank holiday');
    });
  });

  describe('EnglandHolidayCalendar', () => {
    it('should find Christmas and Boxing Day 2025', () => {
      const england = new HolidayService(storage, new EnglandHolidayCalendar());
      const dates = england.getHolidaysInRange(new Date(2025, 11, 1), new Date(2025, 11, 31)).map(h => h.date);
      expect(dates).toEqual(['2025-12-25', '2025-12-26']);
    });
  });
});
