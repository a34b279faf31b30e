/**
 * CLI output utilities
 * Handles formatted output, spinners, and run summaries
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { isPipelineError } from '../pipeline/errors.js';
import type { RunReport, UnitStatus } from '../types/run.js';

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

/**
 * Stop spinner with success
 */
export function succeedSpinner(message?: string): void {
  if (spinner) {
    spinner.succeed(message);
    spinner = null;
  }
}

/**
 * Stop spinner with failure
 */
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
 */
export function printListItem(item: string, indent: number = 0): void {
  const prefix = '  '.repeat(indent) + '- ';
  console.log(theme.secondary(prefix) + item);
}

/**
 * Print a table
 *
 * @param headers - Table headers
 * @param rows - Table rows
 */
export function printTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((h, i) => {
    const maxRow = Math.max(0, ...rows.map((r) => (r[i] ?? '').length));
    return Math.max(h.length, maxRow);
  });

  const headerLine = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join('  ');
  console.log(theme.highlight(headerLine));
  console.log(theme.dim('-'.repeat(headerLine.length)));

  for (const row of rows) {
    const rowLine = row.map((cell, i) => (cell ?? '').padEnd(widths[i] ?? 0)).join('  ');
    console.log(rowLine);
  }
}

function statusLabel(status: UnitStatus): string {
  switch (status) {
    case 'staged':
      return theme.success(status);
    case 'skipped':
      return theme.dim(status);
    case 'removed':
      return theme.warning(status);
    default:
      return theme.info(status);
  }
}

/**
 * Print the unit table and paths of a run report
 */
export function printRunReport(report: RunReport): void {
  printKeyValue('Mode', report.mode);
  printKeyValue('Revisions', report.revisionB ? `${report.revisionA}..${report.revisionB}` : report.revisionA);
  if (report.target) {
    printKeyValue('Target', report.target);
  }
  printKeyValue('Deploy dir', report.deployDir);

  printSection('Static Resources');
  if (report.units.length === 0) {
    printInfo('No static resource changes');
  } else {
    printTable(
      ['Unit', 'Representation', 'Descriptor', 'Status', 'Artifacts'],
      report.units.map((unit) => [
        unit.name,
        unit.representation,
        unit.hasDescriptor ? 'yes' : 'no',
        statusLabel(unit.status),
        unit.artifacts.join(', '),
      ])
    );
  }

  if (report.ignoredPaths.length > 0) {
    printSection('Ignored Paths');
    for (const ignored of report.ignoredPaths) {
      printListItem(ignored);
    }
  }
}

/**
 * Print an error, one line per diagnostic for pipeline errors
 */
export function printDiagnostics(error: unknown): void {
  if (isPipelineError(error)) {
    for (const line of error.diagnostics()) {
      printError(line);
    }
    return;
  }
  printError(error instanceof Error ? error.message : 'Unknown error');
}

