import crypto from 'crypto';
import { SchemaMismatchError } from '../types/errors';
import type { NamedRow, Row, Scalar } from '../types/TimeSeries';

/**
 * Generate a content-based hash for a result row
 * Dates are serialized to ISO strings so equal instants hash equally
 */
export function generateRowHash(row: Row): string {
  const hashContent = JSON.stringify(row);
  return crypto.createHash('sha256').update(hashContent).digest('hex');
}

/**
 * Remove items whose row form exactly repeats an earlier one, keeping first occurrences in order
 */
export function dedupBy<T>(items: T[], toRow: (item: T) => Row): T[] {
  const seenHashes = new Set<string>();
  const unique: T[] = [];

  for (const item of items) {
    const hash = generateRowHash(toRow(item));
    if (!seenHashes.has(hash)) {
      seenHashes.add(hash);
      unique.push(item);
    }
  }

  return unique;
}

export function dedupRows(rows: Row[]): Row[] {
  return dedupBy(rows, (row) => row);
}

/**
 * Zip every row positionally with the column names
 */
export function namedRows(rows: Row[], columns: readonly string[]): NamedRow[] {
  return rows.map((row, index) => {
    if (row.length !== columns.length) {
      throw new SchemaMismatchError(
        `Row ${index} has ${row.length} values, expected ${columns.length} (${columns.join(', ')})`
      );
    }
    const named: NamedRow = {};
    columns.forEach((column, position) => {
      named[column] = row[position];
    });
    return named;
  });
}

// =============================================================================
// Cell coercion
// =============================================================================

export function toText(value: Scalar, column: string): string {
  if (value === null) {
    throw new SchemaMismatchError(`Column '${column}' is empty`);
  }
  return value instanceof Date ? value.toISOString() : String(value);
}

export function toOptionalText(value: Scalar): string | null {
  if (value === null || value === '') {
    return null;
  }
  return value instanceof Date ? value.toISOString() : String(value);
}

export function toNumber(value: Scalar, column: string): number {
  const parsed = toOptionalNumber(value);
  if (parsed === null) {
    throw new SchemaMismatchError(`Column '${column}' is not numeric: ${String(value)}`);
  }
  return parsed;
}

export function toOptionalNumber(value: Scalar): number | null {
  if (value === null || value === '' || value instanceof Date || typeof value === 'boolean') {
    return null;
  }
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}
