export type CellValue = number | string | Date | null;

export type ColumnKind = 'numeric' | 'text' | 'date';

export interface ColumnDef {
  name: string;
  kind: ColumnKind;
}

export type HoldingRow = Record<string, CellValue>;

/** One row per bond position; column order is significant */
export interface HoldingsTable {
  columns: ColumnDef[];
  rows: HoldingRow[];
}

export type ColumnRole = 'rating' | 'sector' | 'issuer' | 'currency';

export interface ResolvedColumns {
  rating: string[];          // every agency column is kept
  sector: string | null;
  issuer: string | null;
  currency: string | null;
}

export interface DistributionEntry {
  label: string | null;      // null = rows with no value
  percent: number;           // % of market value
}

export interface Distribution {
  column: string | null;     // null = no matching column in the table
  entries: DistributionEntry[];
}

export interface PortfolioSummary {
  portfolio: string;
  totalMarketValue: number;
  weightedYieldToWorst: number | null;
  averageMaturityYears: number | null;
}

export interface DurationSummary {
  portfolio: string;
  durationColumn: string | null;
  weightedDuration: number | null;
}

export interface IssuerHolding {
  issuer: string;
  marketValue: number;
}

export interface TopHoldings {
  issuerColumn: string | null;
  holdings: IssuerHolding[];
}

export interface KrdContribution {
  tenor: string;             // e.g. "2Y"
  /** null when the portfolio carries no market value */
  contribution: number | null;
}

export type MaturityBucketLabel = '0-3y' | '3-5y' | '5-10y' | '10-30y' | '30y+';

export interface AnalyzerOptions {
  /** Evaluation date for maturity math, defaults to now */
  asOf?: Date;
}
