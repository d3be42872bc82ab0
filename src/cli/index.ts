#!/usr/bin/env node
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, resolve } from 'node:path';
import { registerAnalyzeCommand } from './commands/analyzeCommand.js';
import { registerCombineCommand, registerExportCommand } from './commands/exportCommand.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
// src/cli or dist/cli → package root
const pkg = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8')) as { version: string };

const program = new Command();

program
  .name('bond-portfolio-analyzer')
  .description('Fixed income portfolio analytics: credit, sector, currency, KRD, maturity and duration')
  .version(pkg.version);

registerAnalyzeCommand(program);
registerExportCommand(program);
registerCombineCommand(program);

program.parseAsync().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
