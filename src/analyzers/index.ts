/** @entry analyzers barrel export */
export { PortfolioAnalyzer, BREAKDOWN_EXCLUDED_COLUMNS } from './portfolioAnalyzer.js';

export {
  COLUMN_ALIASES,
  MARKET_VALUE_COLUMN,
  MATURITY_COLUMN,
  YIELD_TO_WORST_COLUMN,
  KRD_PREFIX,
  findColumns,
  primaryColumn,
  resolveColumns,
  findDurationColumn,
  isTenorLabel,
  krdColumnName,
  tagKrdColumns,
  findKrdColumns,
  tenorOf,
} from './columnResolver.js';

export { COMPOSITE_RATING_COLUMN, RATING_PRIORITY, deriveCompositeRating } from './compositeRating.js';

export { weightedDistribution, compareCells } from './distribution.js';
export type { DistributionOrder } from './distribution.js';

export { MATURITY_BUCKETS, daysToMaturity, yearsToMaturity, bucketOf } from './maturity.js';
export type { MaturityBucket } from './maturity.js';

export { analyzePortfolio } from './analyzePortfolio.js';
export type { PortfolioAnalysis } from './analyzePortfolio.js';
