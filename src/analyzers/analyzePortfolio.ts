/**
 * Runs every analysis against one loaded portfolio
 */
import type {
  Distribution,
  DurationSummary,
  KrdContribution,
  PortfolioSummary,
  TopHoldings,
} from '../types/holdings.js';
import type { PortfolioAnalyzer } from './portfolioAnalyzer.js';

export interface PortfolioAnalysis {
  summary: PortfolioSummary;
  duration: DurationSummary;
  creditDistribution: Distribution;
  ratingDistributionsByAgency: Distribution[];
  sectorExposure: Distribution;
  currencyExposure: Distribution;
  topHoldings: TopHoldings;
  krdProfile: KrdContribution[];
  maturityBuckets: Distribution;
  categoricalBreakdowns: Distribution[];
}

export function analyzePortfolio(analyzer: PortfolioAnalyzer, topN = 10): PortfolioAnalysis {
  return {
    summary: analyzer.summary(),
    duration: analyzer.duration(),
    creditDistribution: analyzer.creditDistribution(),
    ratingDistributionsByAgency: analyzer.ratingDistributionsByAgency(),
    sectorExposure: analyzer.sectorExposure(),
    currencyExposure: analyzer.currencyExposure(),
    topHoldings: analyzer.topHoldings(topN),
    krdProfile: analyzer.krdProfile(),
    maturityBuckets: analyzer.maturityBuckets(),
    categoricalBreakdowns: analyzer.categoricalBreakdowns(topN),
  };
}
