/**
 * Output Formatting Utilities
 *
 * Renders command results for stdout as pretty JSON or CSV, and generates
 * the run id stamped on log entries.
 *
 * CSV rules:
 * - header row from the keys of the records, first-seen order
 * - fields containing a quote, comma or line break are quoted, quotes doubled
 * - null and undefined render as empty fields
 * - nested values render as JSON
 */

import { v4 as uuidv4 } from 'uuid';

export enum OutputFormat {
  JSON = 'json',
  CSV = 'csv',
}

export type OutputRecord = object;

/**
 * Generate a unique run ID
 *
 * @returns UUID v4 string
 */
export function generateRunId(): string {
  return uuidv4();
}

/**
 * Parse an --output value
 *
 * @throws Error for anything but json or csv
 */
export function parseOutputFormat(value: string): OutputFormat {
  const match = Object.values(OutputFormat).find((format) => format === value.toLowerCase());
  if (!match) {
    throw new Error(`Unsupported output format "${value}", expected json or csv`);
  }
  return match;
}

export function formatJson(value: unknown): string {
  return JSON.stringify(value, replaceSets, 2);
}

/**
 * Render records as CSV
 *
 * @example
 * formatCsv([{ username: 'alice', title: null }]) → 'username,title\nalice,'
 */
export function formatCsv(records: OutputRecord[]): string {
  const rows = records.map((record) => Object.entries(record));
  const columns: string[] = [];
  for (const row of rows) {
    for (const [key] of row) {
      if (!columns.includes(key)) {
        columns.push(key);
      }
    }
  }
  if (columns.length === 0) {
    return '';
  }

  const lines = [columns.map(escapeCsvField).join(',')];
  for (const row of rows) {
    const values = new Map(row);
    lines.push(columns.map((column) => escapeCsvField(values.get(column))).join(','));
  }
  return lines.join('\n');
}

/**
 * Render records in the requested format
 */
export function formatRecords(records: OutputRecord[], format: OutputFormat): string {
  return format === OutputFormat.CSV ? formatCsv(records) : formatJson(records);
}

export function escapeCsvField(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  const str = typeof value === 'object' ? JSON.stringify(value, replaceSets) : String(value);
  return /[",\r\n]/.test(str) ? `"${str.replace(/"/g, '""')}"` : str;
}

function replaceSets(_key: string, value: unknown): unknown {
  return value instanceof Set ? [...value].sort() : value;
}
