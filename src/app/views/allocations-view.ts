// src/app/views/allocations-view.ts
import chalk from 'chalk';
import { format } from 'date-fns';
import { Ticket, TicketAllocation } from '../../types/models';
import { roundHours } from '../../services/hours';
import { fromIsoDate, monthLabel } from '../../utils/dateUtils';
import { truncate } from '../../utils/formatters';
import { Column, renderTable, TableRow } from './table';

export interface TicketTotal {
  ticketId: string;
  hours: number;
  entries: number;
  pendingClient: number;   // allocations not yet entered on the client system
}

const ALLOCATION_COLUMNS: Column[] = [
  { header: 'Date', width: 10 },
  { header: 'Ticket', width: 8 },
  { header: 'Description', width: 40 },
  { header: 'Hours', width: 6, align: 'right' },
  { header: 'Client', width: 6 },
];

const TOTAL_COLUMNS: Column[] = [
  { header: 'Ticket', width: 8 },
  { header: 'Description', width: 40 },
  { header: 'Days', width: 4, align: 'right' },
  { header: 'Hours', width: 7, align: 'right' },
  { header: 'Pending', width: 7, align: 'right' },
];

/**
 * Hours per ticket, ordered by ticket id
 */
export function totalsByTicket(allocations: TicketAllocation[]): TicketTotal[] {
  const totals = new Map<string, TicketTotal>();

  for (const a of allocations) {
    const current = totals.get(a.ticketId) ?? { ticketId: a.ticketId, hours: 0, entries: 0, pendingClient: 0 };
    current.hours = roundHours(current.hours + a.hours);
    current.entries++;
    if (!a.enteredOnClient) current.pendingClient++;
    totals.set(a.ticketId, current);
  }

  return [...totals.values()].sort((a, b) => a.ticketId.localeCompare(b.ticketId));
}

export function renderAllocationsView(
  year: number,
  month: number,
  allocations: TicketAllocation[],
  tickets: ReadonlyMap<string, Ticket>
): string[] {
  const description = (id: string) => truncate(tickets.get(id)?.description ?? '', 37);

  const lines = [chalk.bold(`ALLOCATIONS: ${monthLabel(year, month)}`), ''];

  if (!allocations.length) {
    lines.push(chalk.gray('  No allocations this month'));
    return lines;
  }

  const rows: TableRow[] = allocations.map(a => ({
    cells: [
      format(fromIsoDate(a.date), 'EEE dd'),
      a.ticketId,
      description(a.ticketId),
      a.hours.toFixed(2),
      a.enteredOnClient ? '✓' : '',
    ],
    style: a.enteredOnClient ? chalk.dim : undefined,
  }));

  const totals = totalsByTicket(allocations);
  const totalRows: TableRow[] = totals.map(t => ({
    cells: [t.ticketId, description(t.ticketId), String(t.entries), t.hours.toFixed(2), t.pendingClient ? String(t.pendingClient) : '-'],
  }));
  const grandTotal = roundHours(totals.reduce((sum, t) => sum + t.hours, 0));
  totalRows.push({ cells: ['TOTAL', '', '', grandTotal.toFixed(2), ''], style: chalk.bold });

  return [
    ...lines,
    ...renderTable(ALLOCATION_COLUMNS, rows),
    '',
    chalk.cyan('  Totals by ticket'),
    ...renderTable(TOTAL_COLUMNS, totalRows),
  ];
}
