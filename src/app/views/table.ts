// src/app/views/table.ts
import chalk from 'chalk';
import stripAnsi from 'strip-ansi';

export type Align = 'left' | 'right';

export interface Column {
  header: string;
  width: number;
  align?: Align;
}

export interface TableRow {
  cells: string[];
  style?: (text: string) => string;
}

export const RULE_WIDTH = 80;

/**
 * Pad to a visible width, ignoring colour codes
 */
export function pad(text: string, width: number, align: Align = 'left'): string {
  const gap = Math.max(0, width - stripAnsi(text).length);
  return align === 'right' ? ' '.repeat(gap) + text : text + ' '.repeat(gap);
}

export function banner(title: string): string[] {
  const rule = '═'.repeat(RULE_WIDTH);
  return [chalk.cyan(rule), chalk.cyan(`  ${title}`), chalk.cyan(rule)];
}

export function renderTable(columns: Column[], rows: TableRow[]): string[] {
  const header = columns.map(c => pad(c.header, c.width, c.align)).join('  ');
  const underline = columns.map(c => pad('─'.repeat(stripAnsi(c.header).length), c.width, c.align)).join('  ');

  const lines = [chalk.gray(`  ${header}`), chalk.gray(`  ${underline}`)];

  for (const row of rows) {
    const text = columns.map((c, i) => pad(row.cells[i] ?? '', c.width, c.align)).join('  ');
    lines.push(row.style ? row.style(`  ${text}`) : `  ${text}`);
  }

  return lines;
}
