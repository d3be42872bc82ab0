// Cell coercion shared by the loader and the analyzer.
// Anything that does not coerce cleanly becomes null and drops out of sums.
import type { CellValue } from '../types/holdings.js';

const NUMERIC_RE = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?/;

/** Whether a raw string reads as a plain decimal number */
export function isNumericText(text: string): boolean {
  return NUMERIC_RE.test(text.trim());
}

export function toNumber(value: CellValue | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string') {
    const text = value.trim();
    return isNumericText(text) ? Number(text) : null;
  }
  return null;
}

/** Parse "YYYY-MM-DD[ HH:MM[:SS]]" as UTC, otherwise whatever Date accepts */
export function toDate(value: CellValue | undefined): Date | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  if (typeof value !== 'string') return null;

  const text = value.trim();
  if (text === '') return null;

  const m = ISO_DATE_RE.exec(text);
  if (m) {
    const [y, mo, d] = [Number(m[1]), Number(m[2]), Number(m[3])];
    const date = new Date(Date.UTC(y, mo - 1, d, Number(m[4] ?? 0), Number(m[5] ?? 0), Number(m[6] ?? 0)));
    // Date.UTC rolls 2030-02-30 over into March
    if (date.getUTCFullYear() !== y || date.getUTCMonth() !== mo - 1 || date.getUTCDate() !== d) return null;
    return date;
  }

  const parsed = new Date(text);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/** Grouping label for a cell; blanks are missing */
export function toLabel(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString().slice(0, 10);
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : null;
  return value.trim() === '' ? null : value;
}
