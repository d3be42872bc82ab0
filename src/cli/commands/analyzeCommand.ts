import type { Command } from 'commander';
import chalk from 'chalk';
import { loadHoldings, portfolioNameFrom } from '../../loaders/index.js';
import { PortfolioAnalyzer, analyzePortfolio } from '../../analyzers/index.js';
import { formatPortfolioAnalysis, isReportSection, SECTIONS } from '../../formatters/index.js';
import { handleError } from '../handleError.js';
import { parseAsOf, parseTopN } from '../options.js';

interface AnalyzeOptions {
  name?: string;
  asOf?: Date;
  top: number;
  json?: boolean;
  section?: string;
}

export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze <source>')
    .description('Analyze one holdings CSV (local path or http(s) URL)')
    .option('--name <label>', 'portfolio label (default: file name)')
    .option('--as-of <date>', 'evaluation date for maturity math (default: today)', parseAsOf)
    .option('--top <n>', 'rows kept for top holdings and breakdowns', parseTopN, 10)
    .option('--section <name>', `print one section (${SECTIONS.join('|')})`)
    .option('--json', 'print JSON')
    .action(async (source: string, opts: AnalyzeOptions) => {
      try {
        const section = opts.section;
        if (section !== undefined && !isReportSection(section)) {
          console.log(chalk.red(`Unknown section "${section}", expected one of: ${SECTIONS.join(', ')}`));
          process.exitCode = 1;
          return;
        }

        if (!opts.json) console.log(chalk.gray(`Loading ${source} ...`));
        const table = await loadHoldings(source);
        const name = opts.name ?? portfolioNameFrom(source);
        const analyzer = new PortfolioAnalyzer(table, name, { asOf: opts.asOf });
        if (!opts.json) console.log(chalk.gray(`  ${analyzer.rowCount} positions, ${table.columns.length} columns`));

        const analysis = analyzePortfolio(analyzer, opts.top);
        if (opts.json) {
          console.log(JSON.stringify(analysis, null, 2));
        } else {
          formatPortfolioAnalysis(analysis, section);
        }
      } catch (err) {
        handleError(err, source);
      }
    });
}
