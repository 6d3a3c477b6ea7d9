// src/app/views/year-view.ts
import chalk from 'chalk';
import { format } from 'date-fns';
import { Config } from '../../types/models';
import { percentOfTarget, YearSummary } from '../../services/SummaryService';
import { calculateBilling, formatMoney } from '../../services/BillingService';
import { companyYearLabel } from '../../utils/dateUtils';
import { formatHours, formatPercent } from '../../utils/formatters';
import { Column, renderTable, TableRow } from './table';

const BASE_COLUMNS: Column[] = [
  { header: ' ', width: 1 },
  { header: 'Month', width: 8 },
  { header: 'Worked', width: 7, align: 'right' },
  { header: 'Leave', width: 6, align: 'right' },
  { header: 'Sick', width: 6, align: 'right' },
  { header: 'Train', width: 6, align: 'right' },
  { header: 'P/H', width: 6, align: 'right' },
  { header: 'Total', width: 7, align: 'right' },
  { header: 'Target', width: 7, align: 'right' },
  { header: '%', width: 6, align: 'right' },
];

const MONEY_COLUMN: Column = { header: 'Net', width: 12, align: 'right' };

export function renderYearView(
  summary: YearSummary,
  selected: { year: number; month: number },
  config: Config,
  showMoney: boolean
): string[] {
  const columns = showMoney ? [...BASE_COLUMNS, MONEY_COLUMN] : BASE_COLUMNS;

  const rows: TableRow[] = summary.months.map(m => {
    const isSelected = m.year === selected.year && m.month === selected.month;
    const cells = [
      isSelected ? '›' : ' ',
      format(new Date(m.year, m.month - 1, 1), 'MMM yyyy'),
      formatHours(m.worked),
      formatHours(m.leave),
      formatHours(m.sick),
      formatHours(m.training),
      formatHours(m.publicHoliday),
      formatHours(m.total),
      formatHours(m.targetMax),
      formatPercent(percentOfTarget(m.worked, m.targetMax)),
    ];
    if (showMoney) {
      cells.push(formatMoney(calculateBilling(m.total, config).net, config.currency));
    }
    return { cells, style: isSelected ? chalk.inverse : m.total ? undefined : chalk.dim };
  });

  const totals = [
    ' ',
    'TOTAL',
    formatHours(summary.worked),
    formatHours(summary.leave),
    formatHours(summary.sick),
    formatHours(summary.training),
    formatHours(summary.publicHoliday),
    formatHours(summary.total),
    formatHours(summary.targetMax),
    formatPercent(percentOfTarget(summary.worked, summary.targetMax)),
  ];
  if (showMoney) {
    totals.push(formatMoney(calculateBilling(summary.total, config).net, config.currency));
  }
  rows.push({ cells: totals, style: chalk.bold });

  return [
    chalk.bold(`YEAR: ${companyYearLabel(summary.startYear)} (Sep - Aug)`),
    '',
    ...renderTable(columns, rows),
  ];
}
