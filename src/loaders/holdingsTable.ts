/**
 * Builds a typed HoldingsTable out of loosely typed records (CSV rows, JSON)
 */
import type { CellValue, ColumnDef, ColumnKind, HoldingRow, HoldingsTable } from '../types/holdings.js';
import { MATURITY_COLUMN } from '../analyzers/columnResolver.js';
import { HoldingsDataError } from '../errors.js';
import { isNumericText, toDate, toNumber } from './parseUtils.js';

export type RawRecord = Record<string, unknown>;

function isBlank(v: unknown): boolean {
  return v === null || v === undefined || (typeof v === 'string' && v.trim() === '');
}

function rawCell(v: unknown): CellValue {
  if (isBlank(v)) return null;
  if (typeof v === 'number' || typeof v === 'string' || v instanceof Date) return v;
  if (typeof v === 'boolean') return String(v);
  return null;
}

/** Maturity is a date; a column whose every filled cell is numeric is numeric */
export function inferColumnKind(name: string, values: readonly unknown[]): ColumnKind {
  if (name === MATURITY_COLUMN) return 'date';
  const filled = values.filter(v => !isBlank(v));
  const numeric = filled.every(v =>
    (typeof v === 'number' && Number.isFinite(v)) || (typeof v === 'string' && isNumericText(v))
  );
  return numeric ? 'numeric' : 'text';
}

function coerce(kind: ColumnKind, v: unknown): CellValue {
  const cell = rawCell(v);
  if (kind === 'numeric') return toNumber(cell);
  if (kind === 'date') return toDate(cell);
  return typeof cell === 'string' ? cell.trim() : cell;
}

/**
 * @param fields header order; defaults to the keys of the first record
 */
export function createHoldingsTable(records: readonly RawRecord[], fields?: readonly string[]): HoldingsTable {
  const header = fields ?? (records.length > 0 ? Object.keys(records[0]) : []);
  if (header.length === 0) {
    throw new HoldingsDataError('Holdings data has no header row');
  }

  const columns: ColumnDef[] = header.map(raw => {
    const name = raw.trim();
    return { name, kind: inferColumnKind(name, records.map(r => r[raw])) };
  });

  const rows = records.map(record => {
    const row: HoldingRow = {};
    header.forEach((raw, i) => {
      row[columns[i].name] = coerce(columns[i].kind, record[raw]);
    });
    return row;
  });

  return { columns, rows };
}
