import type { SqlValue } from '../../types/index.js';
import type { OutcomeRow } from './types/execution.types.js';

/**
 * Convert a raw driver cell into a SqlValue. NULL stays null.
 */
export function normalizeValue(raw: unknown): SqlValue {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === 'string' || typeof raw === 'number' || typeof raw === 'bigint' || typeof raw === 'boolean') {
    return raw;
  }
  if (raw instanceof Date || Buffer.isBuffer(raw)) return raw;
  if (Array.isArray(raw)) return raw.map(normalizeValue);
  if (typeof raw === 'object') {
    return Object.fromEntries(
      Object.entries(raw).map(([key, value]): [string, SqlValue] => [key, normalizeValue(value)])
    );
  }
  return String(raw);
}

/**
 * Snapshot one driver row with exactly one value per column.
 */
export function snapshotRow(columnCount: number, cells: readonly unknown[]): OutcomeRow {
  return Object.freeze(Array.from({ length: columnCount }, (_, index) => normalizeValue(cells[index])));
}
