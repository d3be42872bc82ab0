import { InvalidArgumentError } from 'commander';
import { toDate } from '../loaders/parseUtils.js';

/** --as-of <date>: evaluation date for maturity math */
export function parseAsOf(value: string): Date {
  const date = toDate(value);
  if (!date) throw new InvalidArgumentError(`Not a date: ${value}`);
  return date;
}

/** --top <n>: falls back to 10 like the analyzer defaults */
export function parseTopN(value: string): number {
  const n = parseInt(value, 10);
  return Number.isFinite(n) && n > 0 ? n : 10;
}
