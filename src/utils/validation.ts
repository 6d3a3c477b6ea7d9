// src/utils/validation.ts
import { z } from 'zod';
import {
  AdjustType,
  Config,
  isAdjustType,
  MAX_TICKET_ID_LENGTH,
  Ticket,
  TimeEntry,
  ValidationResult,
} from '../types/models';
import { hoursToMinutes } from '../services/hours';

export class Validators {
  /**
   * Validate clock time format (H:MM or HH:MM, 24-hour)
   */
  static isValidClockTime(value: string): boolean {
    const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
    if (!match) return false;

    const hours = Number(match[1]);
    const minutes = Number(match[2]);
    return hours < 24 && minutes < 60;
  }

  /**
   * Validate ticket id: 1-8 letters, digits, dashes or underscores
   */
  static isValidTicketId(id: string): boolean {
    return id.length > 0 && id.length <= MAX_TICKET_ID_LENGTH && /^[A-Z0-9_-]+$/i.test(id);
  }

  static isNumeric(value: string): boolean {
    return value.trim() !== '' && Number.isFinite(Number(value.trim()));
  }
}

function ok<T>(value: T): ValidationResult<T> {
  return { success: true, value };
}

function fail<T>(error: string): ValidationResult<T> {
  return { success: false, error };
}

// ════════════════════════════════════════════════════════════════════
// DAY FORM
// ════════════════════════════════════════════════════════════════════

export interface DayFormValues {
  clockIn: string;
  lunch: string;          // minutes
  clockOut: string;
  adjustment: string;     // hours
  adjustType: string;
  comment: string;
}

export function parseClockTime(value: string, field: string = 'Time'): ValidationResult<string | null> {
  const trimmed = value.trim();
  if (!trimmed) return ok(null);

  if (!Validators.isValidClockTime(trimmed)) {
    return fail(`${field} must be HH:MM`);
  }

  const [hours, minutes] = trimmed.split(':');
  return ok(`${hours.padStart(2, '0')}:${minutes}`);
}

export function parseLunchMinutes(value: string): ValidationResult<number | null> {
  const trimmed = value.trim();
  if (!trimmed) return ok(null);

  if (!/^\d+$/.test(trimmed)) {
    return fail('Lunch must be a whole number of minutes');
  }

  const minutes = Number(trimmed);
  return ok(minutes === 0 ? null : minutes);
}

export function parseAdjustmentHours(value: string): ValidationResult<number | null> {
  const trimmed = value.trim();
  if (!trimmed) return ok(null);

  if (!Validators.isNumeric(trimmed)) {
    return fail('Adjustment must be a number of hours');
  }

  const minutes = hoursToMinutes(Number(trimmed));
  return ok(minutes === 0 ? null : minutes);
}

export function parseAdjustType(value: string): ValidationResult<AdjustType | null> {
  const trimmed = value.trim().toUpperCase();
  if (!trimmed) return ok(null);

  return isAdjustType(trimmed) ? ok(trimmed) : fail('Invalid adjust type. Use L, S, T, or P');
}

/**
 * Turn the edit-day form into an entry, or the first validation error.
 * The original entry is never modified.
 */
export function validateDayForm(entry: TimeEntry, values: DayFormValues): ValidationResult<TimeEntry> {
  const clockIn = parseClockTime(values.clockIn, 'Clock in');
  if (!clockIn.success) return clockIn;

  const lunch = parseLunchMinutes(values.lunch);
  if (!lunch.success) return lunch;

  const clockOut = parseClockTime(values.clockOut, 'Clock out');
  if (!clockOut.success) return clockOut;

  const adjustment = parseAdjustmentHours(values.adjustment);
  if (!adjustment.success) return adjustment;

  const adjustType = parseAdjustType(values.adjustType);
  if (!adjustType.success) return adjustType;

  if (adjustment.value !== null && adjustType.value === null) {
    return fail('Adjustment hours require an adjust type');
  }

  return ok({
    date: entry.date,
    dayOfWeek: entry.dayOfWeek,
    clockIn: clockIn.value,
    lunchMinutes: lunch.value,
    clockOut: clockOut.value,
    adjustmentMinutes: adjustment.value,
    adjustType: adjustType.value,
    comment: values.comment.trim() || null,
  });
}

// ════════════════════════════════════════════════════════════════════
// TICKET FORM
// ════════════════════════════════════════════════════════════════════

export interface TicketFormValues {
  id: string;
  description: string;
}

export function validateTicketForm(
  values: TicketFormValues,
  existing: Ticket | null,
  ticketExists: (id: string) => boolean,
  today: string
): ValidationResult<Ticket> {
  const id = existing ? existing.id : values.id.trim().toUpperCase();
  const description = values.description.trim();

  if (!id) return fail('Ticket ID is required');
  if (!description) return fail('Description is required');
  if (id.length > MAX_TICKET_ID_LENGTH) {
    return fail(`Ticket ID must be ${MAX_TICKET_ID_LENGTH} characters or less`);
  }
  if (!Validators.isValidTicketId(id)) {
    return fail('Ticket ID may only contain letters, digits, - and _');
  }
  if (!existing && ticketExists(id)) {
    return fail(`Ticket ${id} already exists`);
  }

  return ok({
    id,
    description,
    archived: existing ? existing.archived : false,
    createdAt: existing ? existing.createdAt : today,
  });
}

// ════════════════════════════════════════════════════════════════════
// ALLOCATION HOURS
// ════════════════════════════════════════════════════════════════════

export function parseAllocationHours(value: string): ValidationResult<number> {
  const trimmed = value.trim();
  if (!trimmed) return fail('Hours is required');
  if (!Validators.isNumeric(trimmed)) return fail('Invalid hours value');

  const hours = Number(trimmed);
  if (hours < 0) return fail('Hours must be positive');

  return ok(Math.round(hours * 100) / 100);
}

// ════════════════════════════════════════════════════════════════════
// CONFIG FORM
// ════════════════════════════════════════════════════════════════════

export interface ConfigFormValues {
  hourlyRate: string;
  currency: string;
  standardDayHours: string;
  vatRate: string;
}

const numberField = (label: string) =>
  z.string().trim().min(1, `${label} is required`)
    .refine(Validators.isNumeric, `${label} must be a number`)
    .transform(Number);

const configFormSchema = z.object({
  hourlyRate: numberField('Hourly rate').refine(n => n >= 0, 'Hourly rate cannot be negative'),
  currency: z.string().trim().toUpperCase().regex(/^[A-Z]{3}$/, 'Currency must be a 3-letter code'),
  standardDayHours: numberField('Standard day')
    .refine(n => n > 0 && n <= 24, 'Standard day must be between 0 and 24 hours'),
  vatRate: numberField('VAT rate').refine(n => n >= 0 && n < 1, 'VAT rate must be a fraction, e.g. 0.20'),
});

export function validateConfigForm(values: ConfigFormValues): ValidationResult<Config> {
  const parsed = configFormSchema.safeParse(values);
  if (!parsed.success) {
    return fail(parsed.error.issues[0].message);
  }
  return ok(parsed.data);
}

/**
 * Adapt a validator to the inquirer `validate` contract
 */
export function asPromptValidator<T>(parseFn: (value: string) => ValidationResult<T>): (input: string) => true | string {
  return (input: string) => {
    const result = parseFn(input);
    return result.success ? true : result.error;
  };
}
