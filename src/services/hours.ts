// src/services/hours.ts
// Derived hour values for time entries. Durations are stored in whole minutes;
// hour values are rounded to two decimal places.

import { TimeEntry } from '../types/models';
import { dayLabel, fromIsoDate, toIsoDate } from '../utils/dateUtils';

export function roundHours(hours: number): number {
  return Math.round((hours + Number.EPSILON) * 100) / 100;
}

export function minutesToHours(minutes: number): number {
  // minutes * 100 / 60 never lands on a half, so plain rounding is exact here
  return Math.round((minutes * 100) / 60) / 100;
}

export function hoursToMinutes(hours: number): number {
  return Math.round(hours * 60);
}

/**
 * Minutes since midnight for an HH:MM value
 */
export function clockMinutes(value: string): number {
  const [hours, minutes] = value.split(':').map(Number);
  return hours * 60 + minutes;
}

export function workedMinutes(entry: TimeEntry): number {
  if (!entry.clockIn || !entry.clockOut) {
    return 0;
  }
  return clockMinutes(entry.clockOut) - clockMinutes(entry.clockIn) - (entry.lunchMinutes ?? 0);
}

/**
 * Hours worked; zero unless both clock times are present. Not clamped at zero.
 */
export function workedHours(entry: TimeEntry): number {
  return minutesToHours(workedMinutes(entry));
}

export function adjustedHours(entry: TimeEntry): number {
  if (!entry.adjustmentMinutes) {
    return 0;
  }
  return minutesToHours(entry.adjustmentMinutes);
}

export function totalHours(entry: TimeEntry): number {
  return roundHours(workedHours(entry) + adjustedHours(entry));
}

export function isBlankEntry(entry: TimeEntry): boolean {
  return entry.clockIn === null && entry.clockOut === null && entry.adjustmentMinutes === null;
}

export function emptyEntry(date: Date | string): TimeEntry {
  const d = typeof date === 'string' ? fromIsoDate(date) : date;
  return {
    date: toIsoDate(d),
    dayOfWeek: dayLabel(d),
    clockIn: null,
    lunchMinutes: null,
    clockOut: null,
    adjustmentMinutes: null,
    adjustType: null,
    comment: null,
  };
}
