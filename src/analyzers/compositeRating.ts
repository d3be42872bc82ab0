import type { HoldingsTable } from '../types/holdings.js';
import { toLabel } from '../loaders/parseUtils.js';

export const COMPOSITE_RATING_COLUMN = 'Composite Rating';

/** Agency priority, highest first */
export const RATING_PRIORITY = ['Fitch', 'Moody', 'S&P', 'MSCI'] as const;

/**
 * Per-row composite rating: first non-missing value walking RATING_PRIORITY,
 * and within one agency its columns in column order.
 */
export function deriveCompositeRating(table: HoldingsTable, ratingColumns: readonly string[]): (string | null)[] {
  const agencyColumns = RATING_PRIORITY.map(agency =>
    ratingColumns.filter(c => c.toLowerCase().includes(agency.toLowerCase()))
  );

  return table.rows.map(row => {
    for (const cols of agencyColumns) {
      for (const col of cols) {
        const rating = toLabel(row[col]);
        if (rating !== null) return rating;
      }
    }
    return null;
  });
}
