import type { SqlValue } from '../../types/index.js';

const CSV_SPECIAL_PATTERN = /[",\r\n]/;

const pad2 = (value: number): string => String(value).padStart(2, '0');

/**
 * `YYYY-MM-DD HH:MM:SS`, always in UTC.
 */
export function formatTimestamp(date: Date): string {
  if (Number.isNaN(date.getTime())) return 'Invalid Date';
  return (
    `${String(date.getUTCFullYear()).padStart(4, '0')}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())} ` +
    `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())}`
  );
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Display form of a cell, shared by table and CSV output.
 */
export function formatValue(value: SqlValue): string {
  if (value === null) return 'NULL';
  if (value instanceof Date) return formatTimestamp(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (Buffer.isBuffer(value)) return `\\x${value.toString('hex')}`;
  if (typeof value === 'object') return JSON.stringify(value, jsonReplacer);
  return String(value);
}

/**
 * Quote a CSV field when it holds a comma, a double quote or a line break.
 */
export function escapeCsvValue(text: string): string {
  if (!CSV_SPECIAL_PATTERN.test(text)) return text;
  return `"${text.replace(/"/g, '""')}"`;
}

/**
 * Inverse of escapeCsvValue for one complete field.
 */
export function unescapeCsvValue(field: string): string {
  if (field.length >= 2 && field.startsWith('"') && field.endsWith('"')) {
    return field.slice(1, -1).replace(/""/g, '"');
  }
  return field;
}

export function formatCsvValue(value: SqlValue): string {
  return escapeCsvValue(formatValue(value));
}
