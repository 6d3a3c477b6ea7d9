// src/app/views/month-view.ts
import chalk from 'chalk';
import { Config } from '../../types/models';
import { MonthSummary, percentOfTarget } from '../../services/SummaryService';
import { calculateBilling, formatMoney } from '../../services/BillingService';
import { monthLabel, shortDate } from '../../utils/dateUtils';
import { formatHours, formatPercent } from '../../utils/formatters';
import { Column, renderTable, TableRow } from './table';

const COLUMNS: Column[] = [
  { header: ' ', width: 1 },
  { header: 'Week', width: 4, align: 'right' },
  { header: 'Dates', width: 15 },
  { header: 'Worked', width: 6, align: 'right' },
  { header: 'Leave', width: 5, align: 'right' },
  { header: 'Sick', width: 5, align: 'right' },
  { header: 'Train', width: 5, align: 'right' },
  { header: 'P/H', width: 5, align: 'right' },
  { header: 'Total', width: 6, align: 'right' },
  { header: 'Target', width: 6, align: 'right' },
  { header: '%', width: 6, align: 'right' },
];

function hoursOrDash(hours: number): string {
  return hours ? formatHours(hours) : '-';
}

export function renderMonthView(summary: MonthSummary, weekIndex: number, config: Config, showMoney: boolean): string[] {
  const rows: TableRow[] = summary.weeks.map((w, i) => ({
    cells: [
      i === weekIndex ? '›' : ' ',
      String(i + 1),
      `${shortDate(w.week.start)} - ${shortDate(w.week.end)}`,
      hoursOrDash(w.worked),
      hoursOrDash(w.leave),
      hoursOrDash(w.sick),
      hoursOrDash(w.training),
      hoursOrDash(w.publicHoliday),
      hoursOrDash(w.total),
      formatHours(w.targetMax),
      formatPercent(percentOfTarget(w.worked, w.targetMax)),
    ],
    style: i === weekIndex ? chalk.inverse : undefined,
  }));

  rows.push({
    cells: [
      ' ',
      '',
      'TOTAL',
      formatHours(summary.worked),
      formatHours(summary.leave),
      formatHours(summary.sick),
      formatHours(summary.training),
      formatHours(summary.publicHoliday),
      formatHours(summary.total),
      formatHours(summary.targetMax),
      formatPercent(percentOfTarget(summary.worked, summary.targetMax)),
    ],
    style: chalk.bold,
  });

  const lines = [
    chalk.bold(`MONTH: ${monthLabel(summary.year, summary.month)}`),
    '',
    ...renderTable(COLUMNS, rows),
  ];

  if (showMoney) {
    const billing = calculateBilling(summary.total, config);
    lines.push(
      '',
      `  Net ${formatMoney(billing.net, config.currency)}   VAT ${formatMoney(billing.vat, config.currency)}   ` +
        chalk.bold(`Gross ${formatMoney(billing.gross, config.currency)}`)
    );
  }

  return lines;
}
