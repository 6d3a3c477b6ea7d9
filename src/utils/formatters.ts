// src/utils/formatters.ts
import { roundHours } from '../services/hours';

/**
 * Shortest decimal form of an hour value: 7.5, 8, 7.25
 */
export function formatHours(hours: number): string {
  return String(roundHours(hours));
}

export function hoursCell(hours: number): string {
  return hours ? `${formatHours(hours)}h` : '-';
}

export function lunchCell(minutes: number | null): string {
  return minutes ? `${String(minutes).padStart(2, '0')}m` : '-';
}

export function clockCell(value: string | null): string {
  return value ?? '-';
}

export function formatPercent(pct: number): string {
  return `${pct.toFixed(1)}%`;
}

export function truncate(text: string | null, max: number): string {
  if (!text) return '';
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
