/**
 * CLI Output Utilities
 *
 * Structured output for JSON, aligned tables and plain tab-separated text.
 * @module @kubesim/cli/output
 */

import chalk from 'chalk';
import { formatResources, type ResourceQuantity } from '@kubesim/shared';

/**
 * Output format type
 */
export type OutputFormat = 'json' | 'table' | 'plain';

/**
 * All output formats
 */
export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table', 'plain'];

/**
 * Narrow a string to an output format
 */
export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Global output format setting
 */
let globalOutputFormat: OutputFormat = 'table';

/**
 * Sets the global output format
 */
export function setOutputFormat(format: OutputFormat): void {
  globalOutputFormat = format;
}

/**
 * Gets the current output format
 */
export function getOutputFormat(): OutputFormat {
  return globalOutputFormat;
}

/**
 * Print raw data: JSON in json mode, strings as they are otherwise
 */
export function output(data: unknown): void {
  if (globalOutputFormat !== 'json' && typeof data === 'string') {
    console.log(data);
    return;
  }
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Outputs a success message
 */
export function success(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ success: true, message }));
  } else if (globalOutputFormat === 'plain') {
    console.log(message);
  } else {
    console.log(chalk.green('✓') + ' ' + message);
  }
}

/**
 * Outputs an error message
 */
export function error(message: string, details?: unknown): void {
  if (globalOutputFormat === 'json') {
    console.error(JSON.stringify({ success: false, error: message, details }));
    return;
  }
  console.error(globalOutputFormat === 'plain' ? message : chalk.red('✗') + ' ' + message);
  if (details) {
    console.error(chalk.gray(JSON.stringify(details, null, 2)));
  }
}

/**
 * Outputs an info message
 */
export function info(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ info: message }));
  } else if (globalOutputFormat === 'plain') {
    console.log(message);
  } else {
    console.log(chalk.blue('ℹ') + ' ' + message);
  }
}

/**
 * Table column
 */
export interface Column<T> {
  key: keyof T & string;
  header: string;
}

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

/**
 * Visible width of a possibly colored string
 */
export function visibleLength(value: string): number {
  return value.replace(ANSI_PATTERN, '').length;
}

function padEnd(value: string, width: number): string {
  return value + ' '.repeat(Math.max(0, width - visibleLength(value)));
}

/**
 * Print rows as an aligned table (table), tab-separated values (plain) or
 * a JSON array (json)
 */
export function table<T extends Record<string, unknown>>(data: T[], columns: Column<T>[]): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify(data, null, 2));
    return;
  }

  if (globalOutputFormat === 'plain') {
    for (const row of data) {
      console.log(columns.map((col) => String(row[col.key] ?? '')).join('\t'));
    }
    return;
  }

  if (data.length === 0) {
    console.log(chalk.gray('No data to display'));
    return;
  }

  const widths = columns.map((col) =>
    Math.max(col.header.length, ...data.map((row) => visibleLength(String(row[col.key] ?? '')))),
  );

  console.log(chalk.bold(columns.map((col, i) => padEnd(col.header, widths[i] ?? 0)).join('  ').trimEnd()));
  console.log(widths.map((w) => '─'.repeat(w)).join('──'));

  for (const row of data) {
    console.log(
      columns
        .map((col, i) => padEnd(String(row[col.key] ?? ''), widths[i] ?? 0))
        .join('  ')
        .trimEnd(),
    );
  }
}

/**
 * Formats key-value pairs for display
 */
export function keyValue(data: Record<string, unknown>): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify(data, null, 2));
    return;
  }

  const maxKeyLength = Math.max(...Object.keys(data).map((k) => k.length));

  for (const [key, value] of Object.entries(data)) {
    if (globalOutputFormat === 'plain') {
      console.log(`${key}\t${formatValue(value)}`);
    } else {
      console.log(`${chalk.bold(key.padEnd(maxKeyLength))}  ${formatValue(value)}`);
    }
  }
}

/**
 * Formats a single value for display
 */
function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return chalk.gray('(none)');
  }
  if (typeof value === 'number') {
    return chalk.cyan(String(value));
  }
  if (typeof value === 'object') {
    return chalk.gray(JSON.stringify(value));
  }
  return String(value);
}

/**
 * Formats a phase badge
 */
export function phaseBadge(phase: string): string {
  if (globalOutputFormat === 'plain') {
    return phase;
  }

  switch (phase) {
    case 'Running':
    case 'Ready':
      return chalk.green('●') + ' ' + chalk.green(phase);
    case 'Pending':
    case 'Provisioning':
    case 'Scheduled':
    case 'Draining':
      return chalk.yellow('◐') + ' ' + chalk.yellow(phase);
    case 'Failed':
      return chalk.red('●') + ' ' + chalk.red(phase);
    case 'Terminated':
    case 'Deleted':
      return chalk.gray('○') + ' ' + chalk.gray(phase);
    default:
      return chalk.blue('●') + ' ' + phase;
  }
}

/**
 * Formats resources, or a dash when absent
 */
export function resources(quantity: ResourceQuantity | undefined): string {
  return quantity ? formatResources(quantity) : '-';
}

/**
 * Formats a date relative to now
 */
export function relativeTime(date: Date | string, now: Date = new Date()): string {
  const d = typeof date === 'string' ? new Date(date) : date;
  const diffSec = Math.floor((now.getTime() - d.getTime()) / 1000);
  const diffMin = Math.floor(diffSec / 60);
  const diffHour = Math.floor(diffMin / 60);
  const diffDay = Math.floor(diffHour / 24);

  if (diffSec < 60) return 'just now';
  if (diffMin < 60) return `${diffMin}m ago`;
  if (diffHour < 24) return `${diffHour}h ago`;
  if (diffDay < 7) return `${diffDay}d ago`;

  return d.toISOString().slice(0, 10);
}

/**
 * Truncates a string to a maximum length
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}
