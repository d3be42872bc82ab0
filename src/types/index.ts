/** @entry types barrel export */
export type {
  CellValue,
  ColumnKind,
  ColumnDef,
  HoldingRow,
  HoldingsTable,
  ColumnRole,
  ResolvedColumns,
  DistributionEntry,
  Distribution,
  PortfolioSummary,
  DurationSummary,
  IssuerHolding,
  TopHoldings,
  KrdContribution,
  MaturityBucketLabel,
  AnalyzerOptions,
} from './holdings.js';
export type { ReportTable, ReportCell } from './report.js';
