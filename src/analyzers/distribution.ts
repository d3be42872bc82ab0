/**
 * Market-value-weighted percentage distribution, the shape shared by the
 * credit, sector, currency and generic breakdowns
 */
import type { CellValue, DistributionEntry } from '../types/holdings.js';
import { toLabel } from '../loaders/parseUtils.js';

export type DistributionOrder = 'label' | 'percent';

interface Group {
  label: string | null;
  key: CellValue;
  total: number;
}

function typeRank(v: CellValue): number {
  if (typeof v === 'number') return 0;
  if (v instanceof Date) return 1;
  return 2;
}

/** Ascending cell order: numbers, dates, then text by code point; missing last */
export function compareCells(a: CellValue, b: CellValue): number {
  if (a === null || b === null) return a === b ? 0 : a === null ? 1 : -1;
  const ra = typeRank(a);
  const rb = typeRank(b);
  if (ra !== rb) return ra - rb;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

/**
 * Group `weights` by `keys`, then express each group as % of the grand total.
 * A missing key is its own group (label null). Missing weights add nothing.
 * A zero grand total gives no entries.
 */
export function weightedDistribution(
  keys: readonly CellValue[],
  weights: readonly (number | null)[],
  order: DistributionOrder,
): DistributionEntry[] {
  const groups = new Map<string | null, Group>();
  keys.forEach((key, i) => {
    const label = toLabel(key);
    let group = groups.get(label);
    if (!group) {
      group = { label, key: label === null ? null : key, total: 0 };
      groups.set(label, group);
    }
    group.total += weights[i] ?? 0;
  });

  const list = [...groups.values()];
  const grandTotal = list.reduce((sum, g) => sum + g.total, 0);
  if (grandTotal === 0) return [];

  list.sort((a, b) => compareCells(a.key, b.key));
  const entries = list.map(g => ({ label: g.label, percent: (g.total / grandTotal) * 100 }));

  if (order === 'percent') {
    // stable sort keeps label order among ties
    entries.sort((a, b) => b.percent - a.percent);
  }
  return entries;
}
