/**
 * Portfolio analytics engine — summary stats, credit quality, sector and
 * currency exposure, KRD profile, maturity and duration over one holdings table.
 *
 * Works on a private copy of the table; the only state written after
 * construction is the composite rating cache.
 */
import type {
  AnalyzerOptions,
  CellValue,
  ColumnDef,
  Distribution,
  DurationSummary,
  HoldingRow,
  HoldingsTable,
  KrdContribution,
  PortfolioSummary,
  ResolvedColumns,
  TopHoldings,
} from '../types/holdings.js';
import { HoldingsDataError } from '../errors.js';
import { toDate, toLabel, toNumber } from '../loaders/parseUtils.js';
import {
  MARKET_VALUE_COLUMN,
  MATURITY_COLUMN,
  YIELD_TO_WORST_COLUMN,
  findDurationColumn,
  findKrdColumns,
  resolveColumns,
  tagKrdColumns,
  tenorOf,
} from './columnResolver.js';
import { COMPOSITE_RATING_COLUMN, deriveCompositeRating } from './compositeRating.js';
import { weightedDistribution } from './distribution.js';
import { MATURITY_BUCKETS, bucketOf, daysToMaturity } from './maturity.js';

/** Free-text columns left out of the generic breakdowns */
export const BREAKDOWN_EXCLUDED_COLUMNS: readonly string[] = ['Issuer Name', 'Description'];

function isPlainRow(row: unknown): row is HoldingRow {
  return typeof row === 'object' && row !== null && !Array.isArray(row) && !(row instanceof Date);
}

/** Trimmed, KRD-tagged private copy of the caller's table */
function copyTable(table: HoldingsTable): HoldingsTable {
  if (!Array.isArray(table.columns) || !Array.isArray(table.rows)) {
    throw new HoldingsDataError('Holdings table must have columns and rows');
  }

  if (table.columns.some(c => typeof c?.name !== 'string')) {
    throw new HoldingsDataError('Every column needs a name');
  }
  const trimmed = table.columns.map(c => c.name.trim());
  const seen = new Set<string>();
  for (const name of trimmed) {
    if (seen.has(name)) throw new HoldingsDataError(`Duplicate column "${name}"`);
    seen.add(name);
  }

  const renames = tagKrdColumns(trimmed);
  const columns: ColumnDef[] = table.columns.map((c, i) => ({
    name: renames.get(trimmed[i]) ?? trimmed[i],
    kind: c.kind,
  }));

  const rows = table.rows.map((row, r) => {
    if (!isPlainRow(row)) throw new HoldingsDataError(`Row ${r + 1} is not a record`);
    const copy: HoldingRow = {};
    table.columns.forEach((c, i) => {
      copy[columns[i].name] = row[c.name] ?? null;
    });
    return copy;
  });

  return { columns, rows };
}

export class PortfolioAnalyzer {
  readonly name: string;
  readonly asOf: Date;
  readonly resolved: ResolvedColumns;

  private readonly table: HoldingsTable;
  private readonly marketValues: (number | null)[];
  private compositeCache: (string | null)[] | undefined;

  constructor(table: HoldingsTable, name = 'Portfolio', options: AnalyzerOptions = {}) {
    this.table = copyTable(table);
    this.name = name;
    this.asOf = options.asOf ?? new Date();

    const mvColumn = this.table.columns.find(c => c.name === MARKET_VALUE_COLUMN);
    if (!mvColumn) {
      throw new HoldingsDataError(`Missing "${MARKET_VALUE_COLUMN}" column`);
    }
    mvColumn.kind = 'numeric';
    this.marketValues = this.table.rows.map(row => {
      const mv = toNumber(row[MARKET_VALUE_COLUMN]);
      row[MARKET_VALUE_COLUMN] = mv;
      return mv;
    });

    this.resolved = resolveColumns(this.columnNames);
  }

  get columnNames(): string[] {
    return this.table.columns.map(c => c.name);
  }

  get rowCount(): number {
    return this.table.rows.length;
  }

  // ====== Summary statistics ======

  totalMarketValue(): number {
    return this.marketValues.reduce<number>((sum, mv) => sum + (mv ?? 0), 0);
  }

  summary(): PortfolioSummary {
    const hasYield = this.hasColumn(YIELD_TO_WORST_COLUMN);
    return {
      portfolio: this.name,
      totalMarketValue: this.totalMarketValue(),
      weightedYieldToWorst: hasYield ? this.weightedAverage(this.numericValues(YIELD_TO_WORST_COLUMN)) : null,
      averageMaturityYears: this.averageMaturityYears(),
    };
  }

  duration(): DurationSummary {
    const durationColumn = findDurationColumn(this.columnNames);
    return {
      portfolio: this.name,
      durationColumn,
      weightedDuration: durationColumn ? this.weightedAverage(this.numericValues(durationColumn)) : null,
    };
  }

  // ====== Credit quality ======

  /** Builds the composite rating once; null when the table has no rating columns */
  compositeRatingColumn(): string | null {
    if (this.resolved.rating.length === 0) return null;
    if (this.compositeCache === undefined) {
      this.compositeCache = deriveCompositeRating(this.table, this.resolved.rating);
    }
    return COMPOSITE_RATING_COLUMN;
  }

  compositeRatings(): readonly (string | null)[] | null {
    return this.compositeRatingColumn() ? this.compositeCache ?? null : null;
  }

  creditDistribution(): Distribution {
    const ratings = this.compositeRatings();
    if (!ratings) return { column: null, entries: [] };
    return {
      column: COMPOSITE_RATING_COLUMN,
      entries: weightedDistribution(ratings, this.marketValues, 'label'),
    };
  }

  ratingDistributionsByAgency(): Distribution[] {
    return this.resolved.rating.map(col => this.distributionOf(col, 'label'));
  }

  // ====== Exposures ======

  sectorExposure(): Distribution {
    return this.resolved.sector ? this.distributionOf(this.resolved.sector, 'percent') : { column: null, entries: [] };
  }

  currencyExposure(): Distribution {
    return this.resolved.currency ? this.distributionOf(this.resolved.currency, 'percent') : { column: null, entries: [] };
  }

  /** Every text column of the source table, top N groups each */
  categoricalBreakdowns(topN = 10): Distribution[] {
    return this.table.columns
      .filter(c => c.kind === 'text' && !BREAKDOWN_EXCLUDED_COLUMNS.includes(c.name))
      .map(c => {
        const dist = this.distributionOf(c.name, 'percent');
        return { column: dist.column, entries: dist.entries.slice(0, Math.max(topN, 0)) };
      });
  }

  topHoldings(n = 10): TopHoldings {
    const issuerColumn = this.resolved.issuer;
    if (!issuerColumn) return { issuerColumn: null, holdings: [] };

    const totals = new Map<string, number>();
    this.table.rows.forEach((row, i) => {
      const issuer = toLabel(row[issuerColumn]);
      if (issuer === null) return;
      totals.set(issuer, (totals.get(issuer) ?? 0) + (this.marketValues[i] ?? 0));
    });

    const holdings = [...totals.entries()]
      .map(([issuer, marketValue]) => ({ issuer, marketValue }))
      .sort((a, b) => b.marketValue - a.marketValue || (a.issuer < b.issuer ? -1 : a.issuer > b.issuer ? 1 : 0))
      .slice(0, Math.max(n, 0));

    return { issuerColumn, holdings };
  }

  // ====== Rate risk ======

  krdProfile(): KrdContribution[] {
    return findKrdColumns(this.columnNames).map(col => ({
      tenor: tenorOf(col),
      contribution: this.weightedAverage(this.numericValues(col)),
    }));
  }

  maturityBuckets(): Distribution {
    if (!this.hasColumn(MATURITY_COLUMN)) return { column: null, entries: [] };

    const totals = new Map<string, number>(MATURITY_BUCKETS.map(b => [b.label, 0]));
    this.table.rows.forEach((row, i) => {
      const maturity = toDate(row[MATURITY_COLUMN]);
      if (!maturity) return;
      const bucket = bucketOf(daysToMaturity(maturity, this.asOf) / 365);
      if (bucket === null) return;
      totals.set(bucket, (totals.get(bucket) ?? 0) + (this.marketValues[i] ?? 0));
    });

    // nothing left to weight: every bucket reads 0
    const bucketed = [...totals.values()].reduce((sum, v) => sum + v, 0);
    const percentOf = (label: string) => (bucketed === 0 ? 0 : ((totals.get(label) ?? 0) / bucketed) * 100);

    return {
      column: MATURITY_COLUMN,
      entries: MATURITY_BUCKETS.map(b => ({ label: b.label, percent: percentOf(b.label) })),
    };
  }

  // ====== Helpers ======

  private hasColumn(name: string): boolean {
    return this.table.columns.some(c => c.name === name);
  }

  private columnValues(name: string): CellValue[] {
    return this.table.rows.map(row => row[name] ?? null);
  }

  private numericValues(name: string): (number | null)[] {
    return this.table.rows.map(row => toNumber(row[name]));
  }

  private distributionOf(column: string, order: 'label' | 'percent'): Distribution {
    return { column, entries: weightedDistribution(this.columnValues(column), this.marketValues, order) };
  }

  /** Σ(x·mv) over rows with both values, over total market value */
  private weightedAverage(values: readonly (number | null)[]): number | null {
    const total = this.totalMarketValue();
    if (total === 0) return null;
    let weighted = 0;
    values.forEach((v, i) => {
      const mv = this.marketValues[i];
      if (v !== null && mv !== null) weighted += v * mv;
    });
    return weighted / total;
  }

  private averageMaturityYears(): number | null {
    if (!this.hasColumn(MATURITY_COLUMN)) return null;
    const days = this.table.rows
      .map(row => toDate(row[MATURITY_COLUMN]))
      .filter((d): d is Date => d !== null)
      .map(d => daysToMaturity(d, this.asOf));
    if (days.length === 0) return null;
    return days.reduce((a, b) => a + b, 0) / days.length / 365;
  }
}
