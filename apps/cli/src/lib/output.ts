/**
 * Output Formatter
 *
 * Everything the commands print goes through here. Human output goes to
 * stdout, problems to stderr, so `--json` output stays parseable.
 */

import chalk from 'chalk';
import type { JobState } from '@encodeq/core';

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.error(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(`${key}:`)} ${String(value)}`);
}

// eslint-disable-next-line no-control-regex
const ANSI_SEQUENCE = /\x1b\[[0-9;]*m/g;

function visibleWidth(text: string): number {
  return text.replace(ANSI_SEQUENCE, '').length;
}

/**
 * Left-aligned columns; cells may already carry colors
 */
export function formatTable(rows: ReadonlyArray<Record<string, string>>): string[] {
  const first = rows[0];
  if (!first) return [];

  const columns = Object.keys(first);
  const widths = columns.map(column =>
    Math.max(column.length, ...rows.map(row => visibleWidth(row[column] ?? '')))
  );
  const pad = (text: string, width: number): string =>
    text + ' '.repeat(Math.max(0, width - visibleWidth(text)));

  const header = columns.map((column, i) => chalk.bold(pad(column.toUpperCase(), widths[i] ?? 0)));
  const lines = rows.map(row => columns.map((column, i) => pad(row[column] ?? '', widths[i] ?? 0)));

  return [header, ...lines].map(cells => cells.join('  ').trimEnd());
}

export function printTable(rows: ReadonlyArray<Record<string, string>>): void {
  if (rows.length === 0) {
    printInfo('No data to display');
    return;
  }
  for (const line of formatTable(rows)) {
    console.log(`  ${line}`);
  }
}

export const stateColors: Record<JobState, (text: string) => string> = {
  PENDING: chalk.gray,
  RUNNING: chalk.blue,
  SUCCEEDED: chalk.green,
  FAILED: chalk.red,
  CANCELED: chalk.yellow,
};
