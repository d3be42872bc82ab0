import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { stripVTControlCharacters } from 'node:util';
import { fmtMoney, fmtPercent, formatDistribution, formatPortfolioAnalysis, isReportSection } from '../terminalFormatter.js';
import { PortfolioAnalyzer } from '../../analyzers/portfolioAnalyzer.js';
import { analyzePortfolio } from '../../analyzers/analyzePortfolio.js';
import { AS_OF, makeBondTable, makeTable } from '../../analyzers/__tests__/fixtures.js';

describe('number formatting', () => {
  it('formats money with separators and two decimals', () => {
    expect(fmtMoney(1234567.891)).toBe('1,234,567.89');
    expect(fmtMoney(0)).toBe('0.00');
  });

  it('formats percentages', () => {
    expect(fmtPercent(12.3456)).toBe('12.35%');
    expect(fmtPercent(5, 0)).toBe('5%');
  });
});

describe('isReportSection', () => {
  it('accepts known sections only', () => {
    expect(isReportSection('krd')).toBe(true);
    expect(isReportSection('charts')).toBe(false);
  });
});

describe('terminal output', () => {
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  function printed(): string[] {
    return logSpy.mock.calls.map(args => stripVTControlCharacters(String(args[0])));
  }

  it('says so when the grouping column is missing', () => {
    formatDistribution('Sector Exposure', 'Sector', { column: null, entries: [] });
    expect(printed()).toContain('  No sector column found');
  });

  it('lists tenor columns even when there is no market value to weight them', () => {
    const table = makeTable([['Market Value', 'numeric'], ['2Y', 'numeric']], [[0, 0.1]]);
    formatPortfolioAnalysis(analyzePortfolio(new PortfolioAnalyzer(table, 'Empty')), 'krd');

    const lines = printed();
    expect(lines).not.toContain('  No KRD tenor columns found');
    expect(lines.some(l => l.includes('2Y'))).toBe(true);
  });

  it('prints only the requested section', () => {
    const analysis = analyzePortfolio(new PortfolioAnalyzer(makeBondTable(), 'USD Portfolio', { asOf: AS_OF }));
    formatPortfolioAnalysis(analysis, 'duration');

    const lines = printed();
    expect(lines).toContain('  Effective Duration (MV weighted): 4.500');
    expect(lines.some(l => l.includes('Top Holdings'))).toBe(false);
  });

  it('prints every section by default', () => {
    const analysis = analyzePortfolio(new PortfolioAnalyzer(makeBondTable(), 'USD Portfolio', { asOf: AS_OF }));
    formatPortfolioAnalysis(analysis);

    const output = printed().join('\n');
    for (const title of ['Summary', 'Credit Quality', 'Sector Exposure', 'Top Holdings', 'KRD Profile', 'Maturity Buckets']) {
      expect(output).toContain(title);
    }
  });
});
