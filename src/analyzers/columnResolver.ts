/**
 * Column resolution — maps semantic roles onto whatever the holdings file calls them
 */
import type { ColumnRole, ResolvedColumns } from '../types/holdings.js';

export const COLUMN_ALIASES: Record<ColumnRole, readonly string[]> = {
  rating: ['Rating', 'Composite Rating', 'Moody', 'S&P', 'Fitch', 'MSCI'],
  sector: ['Sector', 'Issuer Sector', 'Industry', 'GICS Sector'],
  issuer: ['Issuer Name', 'Issuer', 'Security Name', 'Description', 'Ticker'],
  currency: ['Currency', 'Ccy', 'Base Currency', 'Trade Currency'],
};

export const MARKET_VALUE_COLUMN = 'Market Value';
export const MATURITY_COLUMN = 'Maturity';
export const YIELD_TO_WORST_COLUMN = 'Yield to Worst';
export const KRD_PREFIX = 'KRD Contribution ';

const TENOR_RE = /^\d+[MY]$/;

/** All columns whose name contains one of the role's aliases, in column order */
export function findColumns(columns: readonly string[], role: ColumnRole): string[] {
  const aliases = COLUMN_ALIASES[role].map(a => a.toLowerCase());
  return columns.filter(c => {
    const name = c.toLowerCase();
    return aliases.some(a => name.includes(a));
  });
}

export function primaryColumn(columns: readonly string[], role: ColumnRole): string | null {
  return findColumns(columns, role)[0] ?? null;
}

export function resolveColumns(columns: readonly string[]): ResolvedColumns {
  return {
    rating: findColumns(columns, 'rating'),
    sector: primaryColumn(columns, 'sector'),
    issuer: primaryColumn(columns, 'issuer'),
    currency: primaryColumn(columns, 'currency'),
  };
}

export function findDurationColumn(columns: readonly string[]): string | null {
  return columns.find(c => c.toLowerCase().includes('duration')) ?? null;
}

/** Tenor labels such as "2Y" or "6M" */
export function isTenorLabel(name: string): boolean {
  return TENOR_RE.test(name.trim());
}

export function krdColumnName(tenor: string): string {
  return `${KRD_PREFIX}${tenor}`;
}

/**
 * Rename map for tenor columns → "KRD Contribution <tenor>".
 * A tenor is left alone when its target name is already taken.
 */
export function tagKrdColumns(columns: readonly string[]): Map<string, string> {
  const taken = new Set(columns);
  const renames = new Map<string, string>();
  for (const c of columns) {
    if (!isTenorLabel(c)) continue;
    const target = krdColumnName(c.trim());
    if (taken.has(target)) continue;
    renames.set(c, target);
    taken.add(target);
  }
  return renames;
}

export function findKrdColumns(columns: readonly string[]): string[] {
  return columns.filter(c => c.includes(KRD_PREFIX.trim()));
}

/** "KRD Contribution 2Y" → "2Y" */
export function tenorOf(krdColumn: string): string {
  const idx = krdColumn.indexOf(KRD_PREFIX);
  return idx >= 0 ? krdColumn.slice(idx + KRD_PREFIX.length).trim() : krdColumn;
}
