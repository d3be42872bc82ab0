/** @entry bond-portfolio-analyzer public API */

// Types
export type {
  CellValue, ColumnKind, ColumnDef, HoldingRow, HoldingsTable,
  ColumnRole, ResolvedColumns, DistributionEntry, Distribution,
  PortfolioSummary, DurationSummary, IssuerHolding, TopHoldings,
  KrdContribution, MaturityBucketLabel, AnalyzerOptions,
  ReportTable, ReportCell,
} from './types/index.js';

export { HoldingsDataError } from './errors.js';

// Engine
export {
  PortfolioAnalyzer, analyzePortfolio,
  findColumns, primaryColumn, resolveColumns, findDurationColumn,
  deriveCompositeRating, weightedDistribution,
  MATURITY_BUCKETS, yearsToMaturity, bucketOf,
} from './analyzers/index.js';
export type { PortfolioAnalysis } from './analyzers/index.js';

// Input
export { loadHoldings, parseHoldingsCsv, createHoldingsTable } from './loaders/index.js';

// Output
export { buildReports, writeReports, combineReports } from './exporters/index.js';
export { formatPortfolioAnalysis } from './formatters/index.js';
