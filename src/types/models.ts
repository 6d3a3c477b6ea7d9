// src/types/models.ts

// ════════════════════════════════════════════════════════════════════
// TIME ENTRIES
// ════════════════════════════════════════════════════════════════════

export type AdjustType =
  | 'L'   // Leave
  | 'S'   // Sick
  | 'T'   // Training
  | 'P';  // Public holiday

export const ADJUST_TYPES: ReadonlyArray<{ code: AdjustType; label: string }> = [
  { code: 'P', label: 'Public Holiday' },
  { code: 'L', label: 'Leave' },
  { code: 'S', label: 'Sick' },
  { code: 'T', label: 'Training' },
];

export function isAdjustType(value: string | null | undefined): value is AdjustType {
  return ADJUST_TYPES.some(t => t.code === value);
}

export interface TimeEntry {
  date: string;                   // yyyy-MM-dd
  dayOfWeek: string;              // Mon..Sun
  clockIn: string | null;         // HH:MM
  lunchMinutes: number | null;
  clockOut: string | null;        // HH:MM
  adjustmentMinutes: number | null;
  adjustType: AdjustType | null;
  comment: string | null;
}

// ════════════════════════════════════════════════════════════════════
// CONFIG
// ════════════════════════════════════════════════════════════════════

export interface Config {
  hourlyRate: number;
  currency: string;
  standardDayHours: number;
  vatRate: number;
}

export const DEFAULT_CONFIG: Readonly<Config> = {
  hourlyRate: 97,
  currency: 'GBP',
  standardDayHours: 7.5,
  vatRate: 0.2,
};

// ════════════════════════════════════════════════════════════════════
// TICKETS & ALLOCATIONS
// ════════════════════════════════════════════════════════════════════

export const MAX_TICKET_ID_LENGTH = 8;

export interface Ticket {
  id: string;
  description: string;
  archived: boolean;
  createdAt: string | null;       // yyyy-MM-dd
}

export interface TicketAllocation {
  ticketId: string;
  date: string;                   // yyyy-MM-dd
  hours: number;
  enteredOnClient: boolean;
}

// ════════════════════════════════════════════════════════════════════
// RESULTS
// ════════════════════════════════════════════════════════════════════

export type ValidationResult<T> =
  | { success: true; value: T }
  | { success: false; error: string };
