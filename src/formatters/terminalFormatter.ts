import chalk from 'chalk';
import Table from 'cli-table3';
import type { PortfolioAnalysis } from '../analyzers/analyzePortfolio.js';
import type { Distribution, DurationSummary, KrdContribution, PortfolioSummary, TopHoldings } from '../types/holdings.js';

export const SECTIONS = [
  'summary', 'credit', 'agencies', 'sector', 'currency',
  'holdings', 'duration', 'maturity', 'krd', 'breakdowns',
] as const;

export type ReportSection = (typeof SECTIONS)[number];

export function isReportSection(value: string): value is ReportSection {
  return (SECTIONS as readonly string[]).includes(value);
}

const MISSING = chalk.gray('—');

export function fmtMoney(n: number): string {
  return n.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

export function fmtPercent(n: number, decimals = 2): string {
  return `${n.toFixed(decimals)}%`;
}

function fmtOptional(n: number | null, decimals = 2, suffix = ''): string {
  return n === null ? MISSING : `${n.toFixed(decimals)}${suffix}`;
}

/** Heavier weights stand out */
function colorWeight(percent: number): string {
  const s = fmtPercent(percent);
  if (percent >= 25) return chalk.yellow.bold(s);
  if (percent >= 10) return chalk.white(s);
  return chalk.gray(s);
}

function header(title: string): void {
  console.log(chalk.cyan.bold(`─── ${title} ───`));
}

function formatSummary(summary: PortfolioSummary): void {
  header('Summary');
  const table = new Table({ colWidths: [26, 22] });
  table.push(
    ['Total Market Value', fmtMoney(summary.totalMarketValue)],
    ['Weighted Yield to Worst', fmtOptional(summary.weightedYieldToWorst, 3)],
    ['Average Maturity', fmtOptional(summary.averageMaturityYears, 2, ' yrs')],
  );
  console.log(table.toString());
  console.log('');
}

function formatDuration(duration: DurationSummary): void {
  header('Duration');
  if (!duration.durationColumn) {
    console.log(chalk.yellow('  No duration column found'));
  } else {
    console.log(`  ${duration.durationColumn} (MV weighted): ${fmtOptional(duration.weightedDuration, 3)}`);
  }
  console.log('');
}

export function formatDistribution(title: string, keyHeader: string, dist: Distribution): void {
  header(dist.column && dist.column !== title ? `${title} (${dist.column})` : title);
  if (!dist.column) {
    console.log(chalk.yellow(`  No ${keyHeader.toLowerCase()} column found`));
    console.log('');
    return;
  }
  if (dist.entries.length === 0) {
    console.log(chalk.gray('  No market value to distribute'));
    console.log('');
    return;
  }

  const table = new Table({
    head: [chalk.white.bold(keyHeader), chalk.white.bold('Market Value %')],
    colWidths: [28, 16],
  });
  for (const e of dist.entries) {
    table.push([e.label ?? MISSING, colorWeight(e.percent)]);
  }
  console.log(table.toString());
  console.log('');
}

function formatTopHoldings(top: TopHoldings): void {
  header('Top Holdings');
  if (!top.issuerColumn) {
    console.log(chalk.yellow('  No issuer column found'));
    console.log('');
    return;
  }

  const table = new Table({
    head: ['#', chalk.white.bold(top.issuerColumn), chalk.white.bold('Market Value')],
    colWidths: [5, 32, 20],
  });
  top.holdings.forEach((h, i) => {
    table.push([`${i + 1}`, h.issuer, fmtMoney(h.marketValue)]);
  });
  console.log(table.toString());
  console.log('');
}

function formatKrdProfile(profile: KrdContribution[]): void {
  header('KRD Profile');
  if (profile.length === 0) {
    console.log(chalk.yellow('  No KRD tenor columns found'));
    console.log('');
    return;
  }

  const table = new Table({
    head: profile.map(k => chalk.white.bold(k.tenor)),
  });
  table.push(profile.map(k => (k.contribution === null ? MISSING : k.contribution.toFixed(4))));
  console.log(table.toString());
  console.log('');
}

/** Print one section, or the whole analysis when no section is given */
export function formatPortfolioAnalysis(analysis: PortfolioAnalysis, section?: ReportSection): void {
  const show = (s: ReportSection) => section === undefined || section === s;

  console.log('');
  console.log(chalk.cyan.bold(`═══ ${analysis.summary.portfolio} ═══`));
  console.log('');

  if (show('summary')) formatSummary(analysis.summary);
  if (show('credit')) formatDistribution('Credit Quality', 'Rating', analysis.creditDistribution);
  if (show('agencies')) {
    if (analysis.ratingDistributionsByAgency.length === 0 && section === 'agencies') {
      console.log(chalk.yellow('  No rating columns found'));
    }
    for (const dist of analysis.ratingDistributionsByAgency) {
      formatDistribution(dist.column ?? 'Rating', 'Rating', dist);
    }
  }
  if (show('sector')) formatDistribution('Sector Exposure', 'Sector', analysis.sectorExposure);
  if (show('currency')) formatDistribution('Currency Exposure', 'Currency', analysis.currencyExposure);
  if (show('holdings')) formatTopHoldings(analysis.topHoldings);
  if (show('duration')) formatDuration(analysis.duration);
  if (show('maturity')) formatDistribution('Maturity Buckets', 'Maturity', analysis.maturityBuckets);
  if (show('krd')) formatKrdProfile(analysis.krdProfile);
  if (show('breakdowns')) {
    for (const dist of analysis.categoricalBreakdowns) {
      formatDistribution(`${dist.column ?? ''} Breakdown`, dist.column ?? 'Value', dist);
    }
  }
}
