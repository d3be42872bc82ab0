import { describe, it, expect } from 'vitest';
import { buildReports, reportSlug } from '../reportTables.js';
import { PortfolioAnalyzer } from '../../analyzers/portfolioAnalyzer.js';
import { AS_OF, makeBondTable, makeTable } from '../../analyzers/__tests__/fixtures.js';
import type { ReportTable } from '../../types/report.js';

function find(reports: ReportTable[], name: string): ReportTable {
  const report = reports.find(r => r.name === name);
  if (!report) throw new Error(`report ${name} missing`);
  return report;
}

describe('reportSlug', () => {
  it('replaces spaces and path separators', () => {
    expect(reportSlug('S&P Rating')).toBe('S&P_Rating');
    expect(reportSlug('Asset Class/Sub')).toBe('Asset_Class_Sub');
  });
});

describe('buildReports', () => {
  const reports = buildReports(new PortfolioAnalyzer(makeBondTable(), 'USD Portfolio', { asOf: AS_OF }));

  it('emits the report set in export order', () => {
    expect(reports.map(r => r.name)).toEqual([
      'summary',
      'credit_distribution',
      'Moody_Rating_distribution',
      'S&P_Rating_distribution',
      'Fitch_Rating_distribution',
      'sector_exposure',
      'krd_profile',
      'top_holdings',
      'duration',
      'maturity_buckets',
      'currency_exposure',
      'Sector_breakdown',
      'Currency_breakdown',
      'Moody_Rating_breakdown',
      'S&P_Rating_breakdown',
      'Fitch_Rating_breakdown',
      'Country_breakdown',
    ]);
  });

  it('writes the summary as one row', () => {
    const summary = find(reports, 'summary');
    expect(summary.columns).toEqual(['Portfolio', 'Total Market Value', 'Weighted Yield to Worst', 'Average Maturity (yrs)']);
    expect(summary.rows).toHaveLength(1);
    expect(summary.rows[0].slice(0, 2)).toEqual(['USD Portfolio', 200]);
  });

  it('adds a Portfolio column to distribution reports', () => {
    const country = find(reports, 'Country_breakdown');
    expect(country.columns).toEqual(['Country', 'Market Value %', 'Portfolio']);
    expect(country.rows).toEqual([
      ['US', 75, 'USD Portfolio'],
      ['DE', 25, 'USD Portfolio'],
    ]);
  });

  it('keeps the missing rating group as an empty key', () => {
    const credit = find(reports, 'credit_distribution');
    expect(credit.rows.map(r => r[0])).toEqual(['AA', 'BBB', 'Baa1', null]);
  });

  it('lists top holdings and duration', () => {
    expect(find(reports, 'top_holdings').rows).toEqual([
      ['Acme', 150, 'USD Portfolio'],
      ['Zeta', 30, 'USD Portfolio'],
      ['Beta', 20, 'USD Portfolio'],
    ]);
    expect(find(reports, 'duration').rows).toEqual([['USD Portfolio', 4.5]]);
  });

  it('limits breakdowns to topN', () => {
    const limited = buildReports(new PortfolioAnalyzer(makeBondTable(), 'USD Portfolio', { asOf: AS_OF }), { topN: 1 });
    expect(find(limited, 'Country_breakdown').rows).toEqual([['US', 75, 'USD Portfolio']]);
    expect(find(limited, 'top_holdings').rows).toEqual([['Acme', 150, 'USD Portfolio']]);
  });

  it('keeps empty reports for missing columns', () => {
    const bare = buildReports(new PortfolioAnalyzer(makeTable([['Market Value', 'numeric']], [[10]]), 'Bare'));
    expect(bare.map(r => r.name)).toEqual([
      'summary', 'credit_distribution', 'sector_exposure', 'krd_profile', 'top_holdings',
      'duration', 'maturity_buckets', 'currency_exposure',
    ]);
    expect(find(bare, 'sector_exposure').rows).toEqual([]);
    expect(find(bare, 'duration').rows).toEqual([['Bare', null]]);
  });
});
