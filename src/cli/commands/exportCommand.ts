import type { Command } from 'commander';
import chalk from 'chalk';
import { loadHoldings, portfolioNameFrom } from '../../loaders/index.js';
import { PortfolioAnalyzer } from '../../analyzers/index.js';
import { buildReports, reportSlug, combineReports, getExportDir, reportFileName, uniquePrefix, writeReports } from '../../exporters/index.js';
import { handleError } from '../handleError.js';
import { parseAsOf, parseTopN } from '../options.js';

/** Reports merged across portfolios after a multi-portfolio export */
export const COMBINED_REPORTS = [
  'summary',
  'credit_distribution',
  'sector_exposure',
  'krd_profile',
  'top_holdings',
  'duration',
  'maturity_buckets',
  'currency_exposure',
] as const;

export const COMBINED_PREFIX = 'ALL_Portfolios';

interface ExportOptions {
  out?: string;
  asOf?: Date;
  top: number;
}

export function registerExportCommand(program: Command): void {
  program
    .command('export <sources...>')
    .description('Write every report as CSV, one set per holdings file, then combine them')
    .option('--out <dir>', 'export directory (default: HOLDINGS_EXPORT_DIR or ./exports)')
    .option('--as-of <date>', 'evaluation date for maturity math (default: today)', parseAsOf)
    .option('--top <n>', 'rows kept for top holdings and breakdowns', parseTopN, 10)
    .action(async (sources: string[], opts: ExportOptions) => {
      const dir = getExportDir(opts.out);
      const prefixes: string[] = [];

      for (const source of sources) {
        try {
          // usd/holdings.csv and eur/holdings.csv must not share a prefix
          const base = portfolioNameFrom(source);
          const prefix = uniquePrefix(reportSlug(base), new Set(prefixes));
          const name = prefix === reportSlug(base) ? base : prefix;
          const analyzer = new PortfolioAnalyzer(await loadHoldings(source), name, { asOf: opts.asOf });
          const paths = writeReports(dir, prefix, buildReports(analyzer, { topN: opts.top }));
          prefixes.push(prefix);
          console.log(chalk.gray(`  ✓ ${source} → ${paths.length} reports`));
        } catch (err) {
          handleError(err, source);
        }
      }

      if (prefixes.length < 2) {
        if (prefixes.length === 1) console.log(chalk.green(`✓ Reports written to ${dir}`));
        return;
      }

      for (const report of COMBINED_REPORTS) {
        const files = prefixes.map(p => reportFileName(p, report));
        const rows = combineReports(dir, files, reportFileName(COMBINED_PREFIX, report));
        if (rows !== null) console.log(chalk.gray(`  ✓ ${reportFileName(COMBINED_PREFIX, report)} (${rows} rows)`));
      }
      console.log(chalk.green(`✓ Reports for ${prefixes.length} portfolios written to ${dir}`));
    });
}

export function registerCombineCommand(program: Command): void {
  program
    .command('combine <files...>')
    .description('Concatenate same-shaped report CSVs into one file')
    .requiredOption('--output <file>', 'combined file name')
    .option('--dir <dir>', 'directory holding the reports (default: HOLDINGS_EXPORT_DIR or ./exports)')
    .action((files: string[], opts: { output: string; dir?: string }) => {
      const dir = getExportDir(opts.dir);
      try {
        const rows = combineReports(dir, files, opts.output);
        if (rows === null) {
          console.log(chalk.yellow(`None of the reports exist in ${dir}, nothing written`));
          process.exitCode = 1;
          return;
        }
        console.log(chalk.green(`✓ ${opts.output}: ${rows} rows`));
      } catch (err) {
        handleError(err, dir);
      }
    });
}
