/**
 * Output Formatting for CLI Commands
 *
 * Provides consistent output formatting across all CLI commands.
 * Supports: table, json, ndjson, csv formats
 *
 * @module cli/lib/output
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

/**
 * Output format options
 */
export type OutputFormat = 'table' | 'json' | 'ndjson' | 'csv';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'ndjson', 'csv'];

/**
 * Column definition for table and CSV output
 */
export interface TableColumn<T> {
  readonly key: keyof T & string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: unknown) => string;
}

function formatCell<T>(row: T, col: TableColumn<T>): string {
  const value = row[col.key];
  return col.formatter ? col.formatter(value) : String(value ?? '');
}

/**
 * Parse a --format option value
 *
 * @throws Error for unknown formats
 */
export function parseOutputFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value);
  if (!format) {
    throw new Error(`Invalid format: ${value}. Must be one of: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return format;
}

/**
 * Format data as a table
 */
export function formatTable<T>(data: readonly T[], columns: readonly TableColumn<T>[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  // Calculate column widths
  const widths = columns.map((col) => {
    if (col.width) return col.width;
    const maxDataWidth = Math.max(...data.map((row) => formatCell(row, col).length));
    return Math.max(col.header.length, maxDataWidth);
  });

  const headerRow = columns
    .map((col, i) => padCell(col.header, widths[i], col.align ?? 'left'))
    .join(' | ');

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  const dataRows = data.map((row) =>
    columns
      .map((col, i) => padCell(formatCell(row, col), widths[i], col.align ?? 'left'))
      .join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

/**
 * Pad a cell value to the specified width
 */
function padCell(value: string, width: number, align: 'left' | 'right'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;
  return align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
}

/**
 * Format data as JSON
 */
export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Format data as NDJSON
 */
export function formatNdjson<T>(data: readonly T[]): string {
  return data.map((item) => JSON.stringify(item)).join('\n');
}

/**
 * Format data as CSV
 */
export function formatCsv<T>(data: readonly T[], columns: readonly TableColumn<T>[]): string {
  const headerRow = columns.map((c) => escapeCSV(c.header)).join(',');
  const dataRows = data.map((row) =>
    columns.map((col) => escapeCSV(formatCell(row, col))).join(',')
  );
  return [headerRow, ...dataRows].join('\n');
}

/**
 * Escape a value for CSV output
 */
function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Format data in the specified format
 */
export function formatOutput<T>(
  data: readonly T[],
  format: OutputFormat,
  columns: readonly TableColumn<T>[]
): string {
  switch (format) {
    case 'json':
      return formatJson(data);
    case 'ndjson':
      return formatNdjson(data);
    case 'csv':
      return formatCsv(data, columns);
    case 'table':
    default:
      return formatTable(data, columns);
  }
}

/**
 * Common column formatters
 */
export const formatters = {
  /**
   * Show null and undefined as a dash
   */
  optional: (value: unknown): string => {
    if (value === null || value === undefined || value === '') return '-';
    return String(value);
  },

  /**
   * Format a number with locale formatting
   */
  number: (value: unknown): string => {
    if (value === null || value === undefined) return '-';
    const num = Number(value);
    return isNaN(num) ? String(value) : num.toLocaleString();
  },

  /**
   * Format seconds with two decimals
   */
  seconds: (value: unknown): string => {
    if (value === null || value === undefined) return '-';
    const num = Number(value);
    return isNaN(num) ? String(value) : `${num.toFixed(2)}s`;
  },

  /**
   * Format boolean as yes/no
   */
  yesNo: (value: unknown): string => {
    return value ? 'yes' : 'no';
  },
};

/**
 * Write formatted output to a file, creating parent directories
 */
export function writeOutputFile(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content.endsWith('\n') ? content : `${content}\n`, 'utf-8');
}

/**
 * Timestamp for generated file names, e.g. 20240115_023000
 */
export function fileTimestamp(date: Date = new Date()): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Print output to console
 */
export function printOutput(output: string): void {
  console.log(output);
}

/**
 * Print error to stderr
 */
export function printError(message: string): void {
  console.error(`Error: ${message}`);
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  console.log(`Success: ${message}`);
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.warn(`Warning: ${message}`);
}
