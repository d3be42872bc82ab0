/**
 * Flattens analyzer output into (key, value, Portfolio) tables, one per report
 */
import type { PortfolioAnalyzer } from '../analyzers/portfolioAnalyzer.js';
import type { Distribution } from '../types/holdings.js';
import type { ReportTable } from '../types/report.js';

const PERCENT_COLUMN = 'Market Value %';

/** Report file suffix for a column: "S&P Rating" → "S&P_Rating" */
export function reportSlug(column: string): string {
  return column.trim().replace(/[ /\\]/g, '_');
}

function distributionReport(name: string, keyColumn: string, dist: Distribution, portfolio: string): ReportTable {
  return {
    name,
    columns: [keyColumn, PERCENT_COLUMN, 'Portfolio'],
    rows: dist.entries.map(e => [e.label, e.percent, portfolio]),
  };
}

export interface BuildReportsOptions {
  topN?: number;
}

/** The full report set for one portfolio, in export order */
export function buildReports(analyzer: PortfolioAnalyzer, opts: BuildReportsOptions = {}): ReportTable[] {
  const portfolio = analyzer.name;
  const topN = opts.topN ?? 10;
  const reports: ReportTable[] = [];

  const summary = analyzer.summary();
  reports.push({
    name: 'summary',
    columns: ['Portfolio', 'Total Market Value', 'Weighted Yield to Worst', 'Average Maturity (yrs)'],
    rows: [[summary.portfolio, summary.totalMarketValue, summary.weightedYieldToWorst, summary.averageMaturityYears]],
  });

  reports.push(distributionReport('credit_distribution', 'Rating', analyzer.creditDistribution(), portfolio));

  for (const dist of analyzer.ratingDistributionsByAgency()) {
    if (!dist.column) continue;
    reports.push(distributionReport(`${reportSlug(dist.column)}_distribution`, 'Rating', dist, portfolio));
  }

  reports.push(distributionReport('sector_exposure', 'Sector', analyzer.sectorExposure(), portfolio));

  reports.push({
    name: 'krd_profile',
    columns: ['Tenor', 'Contribution', 'Portfolio'],
    rows: analyzer.krdProfile().map(k => [k.tenor, k.contribution, portfolio]),
  });

  reports.push({
    name: 'top_holdings',
    columns: ['Issuer', 'Market Value', 'Portfolio'],
    rows: analyzer.topHoldings(topN).holdings.map(h => [h.issuer, h.marketValue, portfolio]),
  });

  const duration = analyzer.duration();
  reports.push({
    name: 'duration',
    columns: ['Portfolio', 'Weighted Duration'],
    rows: [[duration.portfolio, duration.weightedDuration]],
  });

  reports.push(distributionReport('maturity_buckets', 'Maturity Bucket', analyzer.maturityBuckets(), portfolio));
  reports.push(distributionReport('currency_exposure', 'Currency', analyzer.currencyExposure(), portfolio));

  for (const dist of analyzer.categoricalBreakdowns(topN)) {
    if (!dist.column) continue;
    reports.push(distributionReport(`${reportSlug(dist.column)}_breakdown`, dist.column, dist, portfolio));
  }

  return reports;
}
