// src/app/AppState.ts
import { addDays, differenceInCalendarDays } from 'date-fns';
import { TimeEntry } from '../types/models';
import { emptyEntry } from '../services/hours';
import {
  fromIsoDate,
  getCompanyYear,
  getWeekMonth,
  getWeekRange,
  getWeeksInMonth,
  shiftMonth,
  toIsoDate,
  WeekRange,
} from '../utils/dateUtils';

export type ViewMode = 'week' | 'month' | 'year' | 'day' | 'allocations';

export type StatusLevel = 'info' | 'warning' | 'error';

export interface StatusMessage {
  text: string;
  level: StatusLevel;
}

/**
 * Loads entries for an inclusive yyyy-MM-dd range
 */
export type EntryLoader = (start: string, end: string) => TimeEntry[];

/**
 * Everything the interactive UI displays. Entries for the weeks of the displayed month
 * are cached and reloaded whenever the month changes.
 */
export class AppState {
  viewMode: ViewMode = 'week';
  showMoney = false;
  clipboard: TimeEntry | null = null;
  status: StatusMessage | null = null;

  private _year: number;
  private _month: number;
  private _weeks: WeekRange[] = [];
  private _weekIndex = 0;
  private _selectedDate: string;
  private entries = new Map<string, TimeEntry>();

  constructor(private readonly loadEntries: EntryLoader, today: Date = new Date()) {
    this._year = today.getFullYear();
    this._month = today.getMonth() + 1;
    this._selectedDate = toIsoDate(today);
    this.setMonth(this._year, this._month);
    this._weekIndex = this.findWeekIndex(today);
  }

  get year(): number {
    return this._year;
  }

  get month(): number {
    return this._month;
  }

  get weeks(): readonly WeekRange[] {
    return this._weeks;
  }

  get weekIndex(): number {
    return this._weekIndex;
  }

  get currentWeek(): WeekRange {
    return this._weeks[this._weekIndex];
  }

  get selectedDate(): string {
    return this._selectedDate;
  }

  /**
   * Row of the selected day within the current week (0 = Saturday)
   */
  get cursorIndex(): number {
    return differenceInCalendarDays(fromIsoDate(this._selectedDate), this.currentWeek.start);
  }

  /**
   * Start year of the company year containing the displayed month
   */
  get companyYear(): number {
    return getCompanyYear(this._year, this._month);
  }

  // ════════════════════════════════════════════════════════════════════
  // ENTRY CACHE
  // ════════════════════════════════════════════════════════════════════

  reload(): void {
    const first = this._weeks[0];
    const last = this._weeks[this._weeks.length - 1];
    const loaded = this.loadEntries(toIsoDate(first.start), toIsoDate(last.end));
    this.entries = new Map(loaded.map(e => [e.date, e]));
  }

  get cachedEntries(): ReadonlyMap<string, TimeEntry> {
    return this.entries;
  }

  /**
   * The cached entry for a date, or an empty one
   */
  getEntry(date: string): TimeEntry {
    return this.entries.get(date) ?? emptyEntry(date);
  }

  get selectedEntry(): TimeEntry {
    return this.getEntry(this._selectedDate);
  }

  setEntry(entry: TimeEntry): void {
    this.entries.set(entry.date, entry);
  }

  removeEntry(date: string): void {
    this.entries.delete(date);
  }

  weekDates(week: WeekRange = this.currentWeek): string[] {
    return Array.from({ length: 7 }, (_, i) => toIsoDate(addDays(week.start, i)));
  }

  isInDisplayedMonth(date: string): boolean {
    const d = fromIsoDate(date);
    return d.getFullYear() === this._year && d.getMonth() + 1 === this._month;
  }

  setStatus(text: string, level: StatusLevel = 'info'): void {
    this.status = { text, level };
  }

  // ════════════════════════════════════════════════════════════════════
  // NAVIGATION
  // ════════════════════════════════════════════════════════════════════

  private setMonth(year: number, month: number): void {
    this._year = year;
    this._month = month;
    this._weeks = getWeeksInMonth(year, month);
    this._weekIndex = 0;
    this.reload();
  }

  private findWeekIndex(d: Date): number {
    const key = toIsoDate(d);
    const index = this._weeks.findIndex(w => toIsoDate(w.start) <= key && key <= toIsoDate(w.end));
    return index === -1 ? 0 : index;
  }

  private selectWeek(index: number): void {
    const offset = this.cursorIndex;
    this._weekIndex = index;
    this._selectedDate = toIsoDate(addDays(this.currentWeek.start, offset));
  }

  /**
   * Previous week; from the first week, the last week of the previous month.
   * The month is not re-synced to the week's majority.
   */
  prevWeek(): void {
    if (this._weekIndex > 0) {
      this.selectWeek(this._weekIndex - 1);
      return;
    }
    const offset = this.cursorIndex;
    const { year, month } = shiftMonth(this._year, this._month, -1);
    this.setMonth(year, month);
    this._weekIndex = this._weeks.length - 1;
    this._selectedDate = toIsoDate(addDays(this.currentWeek.start, offset));
  }

  nextWeek(): void {
    if (this._weekIndex < this._weeks.length - 1) {
      this.selectWeek(this._weekIndex + 1);
      return;
    }
    const offset = this.cursorIndex;
    const { year, month } = shiftMonth(this._year, this._month, 1);
    this.setMonth(year, month);
    this._selectedDate = toIsoDate(addDays(this.currentWeek.start, offset));
  }

  /**
   * Move the selection within the current week, stopping at Saturday and Friday
   */
  moveCursor(delta: number): void {
    const target = Math.min(6, Math.max(0, this.cursorIndex + delta));
    this._selectedDate = toIsoDate(addDays(this.currentWeek.start, target));
  }

  /**
   * Show a month, selecting its first day
   */
  goToMonth(year: number, month: number): void {
    this.setMonth(year, month);
    this._selectedDate = toIsoDate(new Date(year, month - 1, 1));
    this._weekIndex = this.findWeekIndex(new Date(year, month - 1, 1));
  }

  prevMonth(): void {
    const { year, month } = shiftMonth(this._year, this._month, -1);
    this.goToMonth(year, month);
  }

  nextMonth(): void {
    const { year, month } = shiftMonth(this._year, this._month, 1);
    this.goToMonth(year, month);
  }

  prevYear(): void {
    const { year, month } = shiftMonth(this._year, this._month, -12);
    this.goToMonth(year, month);
  }

  nextYear(): void {
    const { year, month } = shiftMonth(this._year, this._month, 12);
    this.goToMonth(year, month);
  }

  /**
   * Select a date. A date outside the displayed weeks switches to the month
   * holding most of its week's weekdays.
   */
  goToDate(date: Date): void {
    const key = toIsoDate(date);
    const first = toIsoDate(this._weeks[0].start);
    const last = toIsoDate(this._weeks[this._weeks.length - 1].end);

    if (key < first || key > last) {
      const week = getWeekRange(date);
      const { year, month } = getWeekMonth(week.start, week.end);
      this.setMonth(year, month);
    }

    this._weekIndex = this.findWeekIndex(date);
    this._selectedDate = key;
  }

  prevDay(): void {
    this.goToDate(addDays(fromIsoDate(this._selectedDate), -1));
  }

  nextDay(): void {
    this.goToDate(addDays(fromIsoDate(this._selectedDate), 1));
  }

  goToToday(today: Date = new Date()): void {
    this.setMonth(today.getFullYear(), today.getMonth() + 1);
    this._weekIndex = this.findWeekIndex(today);
    this._selectedDate = toIsoDate(today);
  }
}
