// src/app/views/week-view.ts
import chalk from 'chalk';
import { Config, TimeEntry } from '../../types/models';
import { adjustedHours, workedHours } from '../../services/hours';
import { classifyAllocation, STATUS_SYMBOLS } from '../../services/allocationStatus';
import { calculateBilling, formatMoney } from '../../services/BillingService';
import { dayEquivalent, percentOfTarget, WeekSummaryRow } from '../../services/SummaryService';
import { fromIsoDate, isWeekday, monthLabel, shortDate, WeekRange } from '../../utils/dateUtils';
import { clockCell, formatHours, formatPercent, hoursCell, lunchCell, truncate } from '../../utils/formatters';
import { Column, pad, renderTable, TableRow } from './table';

export interface WeekViewData {
  year: number;
  month: number;
  weekNumber: number;      // 1-based
  weekCount: number;
  week: WeekRange;
  entries: TimeEntry[];    // Saturday..Friday
  selectedDate: string;
  allocated: ReadonlyMap<string, number>;
  summary: WeekSummaryRow;
  config: Config;
  showMoney: boolean;
}

const COLUMNS: Column[] = [
  { header: ' ', width: 1 },
  { header: 'Day', width: 3 },
  { header: 'Date', width: 8 },
  { header: 'In', width: 5 },
  { header: 'Lunch', width: 5 },
  { header: 'Out', width: 5 },
  { header: 'Worked', width: 6, align: 'right' },
  { header: 'Adj', width: 5, align: 'right' },
  { header: 'Type', width: 4 },
  { header: 'Alloc', width: 5 },
  { header: 'Comment', width: 23 },
];

const LABEL_WIDTH = 51;

export function weekHeader(data: Pick<WeekViewData, 'year' | 'month' | 'weekNumber' | 'weekCount' | 'week'>): string {
  const title = `WEEK ${data.weekNumber}: ${monthLabel(data.year, data.month)}`;
  const nav = `◄ ${data.weekNumber}/${data.weekCount} (${shortDate(data.week.start)} - ${shortDate(data.week.end)}) ►`;
  const spacing = Math.max(2, 74 - nav.length - title.length);
  return chalk.bold(title + ' '.repeat(spacing) + nav);
}

export function weekRow(entry: TimeEntry, month: number, selected: boolean, allocated: number): TableRow {
  const d = fromIsoDate(entry.date);
  const dateText = shortDate(d);
  const worked = workedHours(entry);

  return {
    cells: [
      selected ? '›' : ' ',
      entry.dayOfWeek,
      d.getMonth() + 1 === month ? dateText : `(${dateText})`,
      clockCell(entry.clockIn),
      lunchCell(entry.lunchMinutes),
      clockCell(entry.clockOut),
      hoursCell(worked),
      hoursCell(adjustedHours(entry)),
      entry.adjustType ?? '',
      STATUS_SYMBOLS[classifyAllocation(worked, allocated)],
      truncate(entry.comment, 20),
    ],
    style: selected ? chalk.inverse : isWeekday(d) ? undefined : chalk.dim,
  };
}

function summaryLine(label: string, hours: number, standardDayHours: number, suffix: string = ''): string {
  const days = dayEquivalent(hours, standardDayHours);
  return `${pad(label, LABEL_WIDTH, 'right')}  ${pad(formatHours(hours), 6, 'right')}h      (${pad(formatHours(days), 5, 'right')}d)${suffix}`;
}

/**
 * Worked, target, per-type adjustments and total for the week. Zero adjustment lines are dimmed.
 */
export function weeklySummaryLines(summary: WeekSummaryRow, config: Config): string[] {
  const std = config.standardDayHours;
  const pct = percentOfTarget(summary.worked, summary.targetMax);
  const dimIfZero = (hours: number, line: string) => (hours === 0 ? chalk.dim(line) : line);

  return [
    summaryLine('Worked', summary.worked, std),
    summaryLine('of target max', summary.targetMax, std, `   (${formatPercent(pct)})`),
    dimIfZero(summary.leave, summaryLine('Leave', summary.leave, std)),
    dimIfZero(summary.sick, summaryLine('Sick', summary.sick, std)),
    dimIfZero(summary.training, summaryLine('Training', summary.training, std)),
    dimIfZero(summary.publicHoliday, summaryLine('P/H', summary.publicHoliday, std)),
    summaryLine('TOTAL', summary.total, std),
  ];
}

export function moneyLines(hours: number, config: Config): string[] {
  const billing = calculateBilling(hours, config);
  return [
    `${pad('Net', LABEL_WIDTH, 'right')}  ${formatMoney(billing.net, config.currency)}`,
    `${pad(`VAT ${formatPercent(config.vatRate * 100)}`, LABEL_WIDTH, 'right')}  ${formatMoney(billing.vat, config.currency)}`,
    chalk.bold(`${pad('Gross', LABEL_WIDTH, 'right')}  ${formatMoney(billing.gross, config.currency)}`),
  ];
}

export function renderWeekView(data: WeekViewData): string[] {
  const rows = data.entries.map(entry =>
    weekRow(entry, data.month, entry.date === data.selectedDate, data.allocated.get(entry.date) ?? 0)
  );

  const lines = [
    weekHeader(data),
    '',
    ...renderTable(COLUMNS, rows),
    '',
    ...weeklySummaryLines(data.summary, data.config),
  ];

  if (data.showMoney) {
    lines.push('', ...moneyLines(data.summary.total, data.config));
  }

  return lines;
}
