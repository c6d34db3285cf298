/**
 * CLI output utilities
 * Handles formatted output, spinners, and progress display
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { describeErrorChain } from '../staging/errors.js';
import { getLevelIcon, type LogEntry } from '../staging/staging-logger.js';

/**
 * Output theme colors
 */
export const theme = {
  primary: chalk.cyan,
  secondary: chalk.gray,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  highlight: chalk.bold.white,
  dim: chalk.dim,
};

/**
 * Spinner instance for progress display
 */
let spinner: Ora | null = null;

/**
 * Start a spinner with a message
 *
 * @param message - Initial message
 * @returns Spinner instance
 */
export function startSpinner(message: string): Ora {
  if (spinner) {
    spinner.stop();
  }
  spinner = ora({
    text: message,
    spinner: 'dots',
  }).start();
  return spinner;
}

/**
 * Update spinner message
 */
export function updateSpinner(message: string): void {
  if (spinner) {
    spinner.text = message;
  }
}

export function succeedSpinner(message?: string): void {
  if (spinner) {
    spinner.succeed(message);
    spinner = null;
  }
}

export function failSpinner(message?: string): void {
  if (spinner) {
    spinner.fail(message);
    spinner = null;
  }
}

/**
 * Print a header
 */
export function printHeader(title: string): void {
  console.log();
  console.log(theme.primary.bold(`=== ${title} ===`));
  console.log();
}

/**
 * Print a section header
 */
export function printSection(title: string): void {
  console.log();
  console.log(theme.highlight(`--- ${title} ---`));
}

export function printSuccess(message: string): void {
  console.log(theme.success(`[OK] ${message}`));
}

export function printWarning(message: string): void {
  console.log(theme.warning(`[WARN] ${message}`));
}

export function printError(message: string): void {
  console.log(theme.error(`[ERROR] ${message}`));
}

export function printInfo(message: string): void {
  console.log(theme.info(`[INFO] ${message}`));
}

/**
 * Print a key-value pair
 */
export function printKeyValue(key: string, value: string | number | boolean): void {
  console.log(`  ${theme.secondary(key + ':')} ${value}`);
}

/**
 * Print a list item
 *
 * @param indent - Indentation level
 */
export function printListItem(item: string, indent: number = 0): void {
  const prefix = '  '.repeat(indent) + '- ';
  console.log(theme.secondary(prefix) + item);
}

/**
 * Print a table
 */
export function printTable(headers: string[], rows: string[][]): void {
  // Calculate column widths
  const widths = headers.map((h, i) => {
    const maxRow = Math.max(0, ...rows.map((r) => (r[i] || '').length));
    return Math.max(h.length, maxRow);
  });

  const headerLine = headers.map((h, i) => h.padEnd(widths[i])).join('  ');
  console.log(theme.highlight(headerLine));
  console.log(theme.dim('-'.repeat(headerLine.length)));

  for (const row of rows) {
    const rowLine = row.map((cell, i) => (cell || '').padEnd(widths[i])).join('  ');
    console.log(rowLine);
  }
}

/**
 * Format a staging log entry as a single console line
 */
export function formatLogEntry(entry: LogEntry): string {
  const line = `${getLevelIcon(entry.level)} ${entry.stage}: ${entry.message}`;
  switch (entry.level) {
    case 'error':
      return theme.error(line);
    case 'warn':
      return theme.warning(line);
    case 'success':
      return theme.success(line);
    case 'debug':
      return theme.dim(line);
    default:
      return theme.info(line);
  }
}

/**
 * Listener for the staging logger: warnings and errors always, the rest in
 * verbose mode only
 */
export function createConsoleListener(verbose: boolean): (entry: LogEntry) => void {
  return (entry) => {
    if (!verbose && entry.level !== 'warn' && entry.level !== 'error') {
      if (entry.event === 'stage_start') updateSpinner(entry.message);
      return;
    }
    console.log(formatLogEntry(entry));
  };
}

/**
 * Print an error and, in verbose mode, its causes
 */
export function printFailure(error: unknown, verbose: boolean = false): void {
  const [message, ...causes] = describeErrorChain(error);
  printError(message ?? 'Unknown error');
  if (verbose) {
    for (const cause of causes) printListItem(theme.dim(`caused by: ${cause}`), 1);
  }
}
