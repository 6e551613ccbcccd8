import Table from 'cli-table3';
import chalk from 'chalk';

// Print formatted table using cli-table3 with cyan headers
export function printTable(headers: string[], rows: string[][]): void {
  const table = new Table({
    head: headers.map((h) => chalk.cyan(h)),
    style: { head: [], border: [] },
  });

  rows.forEach((row) => table.push(row));
  console.log(table.toString());
}

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

// Errors go to stderr
export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

// Returns - if null/undefined
export function formatDate(date: Date | null | undefined): string {
  if (!date) return '-';
  return date.toLocaleString();
}

// Case status with color coding
export function formatCaseStatus(status: string): string {
  const colors: Record<string, typeof chalk.green> = {
    OPEN: chalk.blue,
    PENDING: chalk.yellow,
    RESOLVED: chalk.green,
    REOPENED: chalk.magenta,
  };

  const colorFn = colors[status] || chalk.white;
  return colorFn(status);
}

// Outbox message status with color coding
export function formatStatus(status: string): string {
  const colors: Record<string, typeof chalk.green> = {
    pending: chalk.yellow,
    sent: chalk.green,
    failed: chalk.red,
  };

  const colorFn = colors[status] || chalk.white;
  return colorFn(status);
}

// Transition outcome: applied green, rejected red
export function formatOutcome(outcome: string): string {
  return outcome === 'applied' ? chalk.green(outcome) : chalk.red(outcome);
}
