import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import Papa from 'papaparse';
import type { ReportTable } from '../types/report.js';

const DEFAULT_EXPORT_DIR = 'exports';

/** Export directory: explicit option first, then HOLDINGS_EXPORT_DIR */
export function getExportDir(dir?: string): string {
  return dir || process.env.HOLDINGS_EXPORT_DIR || DEFAULT_EXPORT_DIR;
}

export function reportFileName(prefix: string, report: ReportTable | string): string {
  const name = typeof report === 'string' ? report : report.name;
  return `${prefix}_${name}.csv`;
}

/** First of prefix, prefix_2, prefix_3 ... not yet taken */
export function uniquePrefix(prefix: string, taken: ReadonlySet<string>): string {
  let candidate = prefix;
  for (let n = 2; taken.has(candidate); n++) candidate = `${prefix}_${n}`;
  return candidate;
}

export function toCsv(report: ReportTable): string {
  return Papa.unparse({ fields: report.columns, data: report.rows });
}

/** Write one CSV per report, returns the written paths */
export function writeReports(dir: string, prefix: string, reports: readonly ReportTable[]): string[] {
  mkdirSync(dir, { recursive: true });
  return reports.map(report => {
    const path = join(dir, reportFileName(prefix, report));
    writeFileSync(path, toCsv(report), 'utf-8');
    return path;
  });
}

/**
 * Concatenate same-shaped report CSVs (e.g. one per portfolio) into one file.
 * Missing inputs are skipped; returns the combined row count, or null when
 * none of the inputs exist.
 */
export function combineReports(dir: string, files: readonly string[], output: string): number | null {
  const columns: string[] = [];
  const rows: Record<string, string>[] = [];

  for (const file of files) {
    const path = join(dir, file);
    if (!existsSync(path)) continue;
    const parsed = Papa.parse<Record<string, string>>(readFileSync(path, 'utf-8'), {
      header: true,
      skipEmptyLines: true,
    });
    for (const field of parsed.meta.fields ?? []) {
      if (!columns.includes(field)) columns.push(field);
    }
    rows.push(...parsed.data);
  }

  if (columns.length === 0) return null;

  mkdirSync(dir, { recursive: true });
  const csv = Papa.unparse({ fields: columns, data: rows.map(r => columns.map(c => r[c] ?? '')) });
  writeFileSync(join(dir, output), csv, 'utf-8');
  return rows.length;
}
