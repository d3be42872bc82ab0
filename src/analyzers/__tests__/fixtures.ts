import type { CellValue, ColumnKind, HoldingRow, HoldingsTable } from '../../types/holdings.js';

const DAY_MS = 24 * 3600 * 1000;

export const AS_OF = new Date(Date.UTC(2026, 0, 1));

export function daysFromAsOf(days: number): Date {
  return new Date(AS_OF.getTime() + days * DAY_MS);
}

/** Build a table from [name, kind] pairs and positional rows */
export function makeTable(columns: [string, ColumnKind][], rows: CellValue[][]): HoldingsTable {
  return {
    columns: columns.map(([name, kind]) => ({ name, kind })),
    rows: rows.map(values => {
      const row: HoldingRow = {};
      columns.forEach(([name], i) => {
        row[name] = values[i] ?? null;
      });
      return row;
    }),
  };
}

/**
 * Four positions, total market value 200:
 *   Acme 100 + 50, Zeta 30 (matured), Beta 20 (no maturity, no ratings)
 */
export function makeBondTable(): HoldingsTable {
  return makeTable(
    [
      ['Issuer Name', 'text'],
      ['Sector', 'text'],
      ['Currency', 'text'],
      ['Moody Rating', 'text'],
      ['S&P Rating', 'text'],
      ['Fitch Rating', 'text'],
      ['Market Value', 'numeric'],
      ['Yield to Worst', 'numeric'],
      ['Effective Duration', 'numeric'],
      ['Maturity', 'date'],
      ['2Y', 'numeric'],
      ['10Y', 'numeric'],
      ['Country', 'text'],
    ],
    [
      ['Acme', 'Energy', 'USD', 'Aa2', 'A', 'AA', 100, 4, 5, daysFromAsOf(1000), 0.1, 1.0, 'US'],
      ['Acme', 'Energy', 'USD', null, 'BBB', null, 50, 5, 3, daysFromAsOf(2000), 0.2, 0.5, 'US'],
      ['Zeta', 'Utilities', 'EUR', 'Baa1', null, null, 30, null, 7, daysFromAsOf(-100), 0.3, 2.0, 'DE'],
      ['Beta', 'Financials', 'EUR', null, null, null, 20, 6, 2, null, null, 1.5, 'DE'],
    ],
  );
}
