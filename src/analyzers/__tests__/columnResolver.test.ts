import { describe, it, expect } from 'vitest';
import {
  findColumns,
  primaryColumn,
  resolveColumns,
  findDurationColumn,
  isTenorLabel,
  tagKrdColumns,
  findKrdColumns,
  tenorOf,
} from '../columnResolver.js';

const COLUMNS = [
  'CUSIP',
  'Security Name',
  'Issuer Name',
  "Moody's Rating",
  'S&P Rating',
  'FX Currency Code',
  'GICS Sector',
  'Industry',
  'Market Value',
  'Mod Duration',
];

describe('findColumns', () => {
  it('matches aliases case-insensitively and keeps column order', () => {
    expect(findColumns(COLUMNS, 'rating')).toEqual(["Moody's Rating", 'S&P Rating']);
    expect(findColumns(COLUMNS, 'sector')).toEqual(['GICS Sector', 'Industry']);
    expect(findColumns(COLUMNS, 'issuer')).toEqual(['Security Name', 'Issuer Name']);
  });

  it('recognizes "S&P Rating" and "FX Currency Code"', () => {
    expect(findColumns(['S&P Rating'], 'rating')).toEqual(['S&P Rating']);
    expect(findColumns(['FX Currency Code'], 'currency')).toEqual(['FX Currency Code']);
  });

  it('matches lower-case headers', () => {
    expect(findColumns(['fitch', 'msci esg'], 'rating')).toEqual(['fitch', 'msci esg']);
  });

  it('returns an empty list when nothing matches', () => {
    expect(findColumns(['Market Value'], 'currency')).toEqual([]);
  });
});

describe('primaryColumn', () => {
  it('takes the first match', () => {
    expect(primaryColumn(COLUMNS, 'issuer')).toBe('Security Name');
  });

  it('returns null when there is no match', () => {
    expect(primaryColumn([], 'sector')).toBeNull();
  });
});

describe('resolveColumns', () => {
  it('keeps every rating column and one column per other role', () => {
    expect(resolveColumns(COLUMNS)).toEqual({
      rating: ["Moody's Rating", 'S&P Rating'],
      sector: 'GICS Sector',
      issuer: 'Security Name',
      currency: 'FX Currency Code',
    });
  });
});

describe('findDurationColumn', () => {
  it('finds the first column mentioning duration', () => {
    expect(findDurationColumn(COLUMNS)).toBe('Mod Duration');
    expect(findDurationColumn(['OAD', 'DURATION (EFF)', 'Spread Duration'])).toBe('DURATION (EFF)');
  });

  it('returns null without one', () => {
    expect(findDurationColumn(['Market Value'])).toBeNull();
  });
});

describe('KRD tenor columns', () => {
  it('recognizes integer + M or Y labels', () => {
    expect(isTenorLabel('2Y')).toBe(true);
    expect(isTenorLabel('30Y')).toBe(true);
    expect(isTenorLabel('6M')).toBe(true);
    expect(isTenorLabel('2.5Y')).toBe(false);
    expect(isTenorLabel('Y2')).toBe(false);
    expect(isTenorLabel('2 Years')).toBe(false);
  });

  it('renames tenor columns', () => {
    const renames = tagKrdColumns(['Market Value', '6M', '2Y']);
    expect([...renames.entries()]).toEqual([
      ['6M', 'KRD Contribution 6M'],
      ['2Y', 'KRD Contribution 2Y'],
    ]);
  });

  it('leaves a tenor alone when its target name exists', () => {
    const renames = tagKrdColumns(['2Y', 'KRD Contribution 2Y']);
    expect(renames.size).toBe(0);
  });

  it('finds tagged columns and strips the prefix', () => {
    const cols = ['Market Value', 'KRD Contribution 2Y', 'KRD Contribution 10Y'];
    expect(findKrdColumns(cols)).toEqual(['KRD Contribution 2Y', 'KRD Contribution 10Y']);
    expect(tenorOf('KRD Contribution 10Y')).toBe('10Y');
  });
});
