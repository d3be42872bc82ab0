/**
 * Maturity math — years to maturity and fixed maturity buckets
 */
import type { MaturityBucketLabel } from '../types/holdings.js';

const DAY_MS = 24 * 3600 * 1000;

export interface MaturityBucket {
  label: MaturityBucketLabel;
  min: number;   // inclusive, years
  max: number;   // exclusive, years
}

export const MATURITY_BUCKETS: readonly MaturityBucket[] = [
  { label: '0-3y', min: 0, max: 3 },
  { label: '3-5y', min: 3, max: 5 },
  { label: '5-10y', min: 5, max: 10 },
  { label: '10-30y', min: 10, max: 30 },
  { label: '30y+', min: 30, max: Infinity },
];

/** Whole days from asOf to maturity, floored (negative once matured) */
export function daysToMaturity(maturity: Date, asOf: Date): number {
  return Math.floor((maturity.getTime() - asOf.getTime()) / DAY_MS);
}

export function yearsToMaturity(maturity: Date, asOf: Date): number {
  return daysToMaturity(maturity, asOf) / 365;
}

/** Matured bonds (years < 0) belong to no bucket */
export function bucketOf(years: number): MaturityBucketLabel | null {
  if (!Number.isFinite(years)) return null;
  return MATURITY_BUCKETS.find(b => years >= b.min && years < b.max)?.label ?? null;
}
