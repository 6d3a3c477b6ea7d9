// src/app/views/day-view.ts
import chalk from 'chalk';
import { format } from 'date-fns';
import { Config, Ticket, TicketAllocation, TimeEntry } from '../../types/models';
import { adjustedHours, roundHours, totalHours, workedHours } from '../../services/hours';
import {
  allocationPercentage,
  AllocationStatus,
  classifyAllocation,
  STATUS_LABELS,
} from '../../services/allocationStatus';
import { calculateBilling, formatMoney } from '../../services/BillingService';
import { fromIsoDate } from '../../utils/dateUtils';
import { clockCell, formatPercent, hoursCell, lunchCell, truncate } from '../../utils/formatters';
import { Column, renderTable } from './table';

export interface DayViewData {
  entry: TimeEntry;
  allocations: TicketAllocation[];
  tickets: ReadonlyMap<string, Ticket>;
  config: Config;
  showMoney: boolean;
}

const STATUS_COLOURS: Record<AllocationStatus, (text: string) => string> = {
  none: chalk.gray,
  unallocated: chalk.yellow,
  under: chalk.yellow,
  over: chalk.red,
  exact: chalk.green,
};

const ALLOCATION_COLUMNS: Column[] = [
  { header: 'Ticket', width: 8 },
  { header: 'Description', width: 44 },
  { header: 'Hours', width: 6, align: 'right' },
  { header: 'Client', width: 6 },
];

export function dayHeader(date: string): string {
  return chalk.bold(`DAY: ${format(fromIsoDate(date), 'EEE MMM dd, yyyy')}`);
}

/**
 * Clock times and adjustment for the day; the comment line only when there is one
 */
export function dayTimeEntryLines(entry: TimeEntry): string[] {
  const adjustment = adjustedHours(entry);
  const lines = [
    `In: ${clockCell(entry.clockIn)}   Lunch: ${lunchCell(entry.lunchMinutes)}   Out: ${clockCell(entry.clockOut)}   ` +
      `Adj: ${hoursCell(adjustment)}   Type: ${entry.adjustType ?? '-'}`,
  ];
  if (entry.comment) {
    lines.push(`Comment: ${entry.comment}`);
  }
  return lines;
}

export function daySummaryLine(worked: number, allocated: number): string {
  const status = classifyAllocation(worked, allocated);
  if (status === 'none') {
    return chalk.gray(STATUS_LABELS.none);
  }

  const remaining = roundHours(worked - allocated);
  const pct = formatPercent(allocationPercentage(worked, allocated));
  return `Worked: ${worked.toFixed(2)}h   Allocated: ${allocated.toFixed(2)}h   Remaining: ${remaining.toFixed(2)}h   ` +
    STATUS_COLOURS[status](`${STATUS_LABELS[status]} (${pct})`);
}

export function renderDayView(data: DayViewData): string[] {
  const { entry, allocations } = data;
  const worked = workedHours(entry);
  const allocated = roundHours(allocations.reduce((sum, a) => sum + a.hours, 0));

  const rows = allocations.map(a => ({
    cells: [
      a.ticketId,
      truncate(data.tickets.get(a.ticketId)?.description ?? '', 40),
      a.hours.toFixed(2),
      a.enteredOnClient ? '✓' : '',
    ],
  }));

  const lines = [
    dayHeader(entry.date),
    '',
    ...dayTimeEntryLines(entry),
    '',
    ...(rows.length ? renderTable(ALLOCATION_COLUMNS, rows) : [chalk.gray('  No allocations')]),
    '',
    daySummaryLine(worked, allocated),
  ];

  if (data.showMoney) {
    const billing = calculateBilling(totalHours(entry), data.config);
    lines.push(`Billable: ${formatMoney(billing.net, data.config.currency)} net, ${formatMoney(billing.gross, data.config.currency)} gross`);
  }

  return lines;
}
