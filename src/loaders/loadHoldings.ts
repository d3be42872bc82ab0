import { readFileSync } from 'node:fs';
import { basename, extname } from 'node:path';
import Papa from 'papaparse';
import type { HoldingsTable } from '../types/holdings.js';
import { HoldingsDataError } from '../errors.js';
import { fetchWithRetry } from './httpClient.js';
import { createHoldingsTable } from './holdingsTable.js';

const URL_RE = /^https?:\/\//i;

/** Parse a cleaned holdings CSV (header row first) into a typed table */
export function parseHoldingsCsv(text: string): HoldingsTable {
  const result = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim(),
  });

  const quoteError = result.errors.find(e => e.type === 'Quotes');
  if (quoteError) {
    throw new HoldingsDataError(`Malformed CSV at row ${(quoteError.row ?? 0) + 1}: ${quoteError.message}`);
  }

  const fields = (result.meta.fields ?? []).filter(f => f !== '');
  return createHoldingsTable(result.data, fields);
}

/** Read a local path or an http(s) URL */
export async function loadHoldings(source: string): Promise<HoldingsTable> {
  const text = URL_RE.test(source)
    ? (await fetchWithRetry<string>(source)).data
    : readFileSync(source, 'utf-8');
  return parseHoldingsCsv(text);
}

/** "data/clean/PORT_USD_clean.csv" → "PORT_USD_clean" */
export function portfolioNameFrom(source: string): string {
  const path = URL_RE.test(source) ? new URL(source).pathname : source;
  const file = basename(path);
  return basename(file, extname(file)) || 'Portfolio';
}
