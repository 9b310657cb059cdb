/**
 * Descriptive statistics, correlation and least squares fit
 */

import { ValidationError } from '../errors.js';

export interface DescriptiveStats {
  count: number;
  mean: number;
  median: number;
  std: number;                    // sample standard deviation (n - 1)
  min: number;
  max: number;
  q25: number;
  q75: number;
}

export interface GroupStats extends DescriptiveStats {
  group: string;
}

export interface RegressionResult {
  slope: number;
  intercept: number;
  rSquared: number;
  rValue: number;
  stdErr: number;                 // standard error of the slope, NaN below three points
}

function assertNonEmpty(values: readonly number[]): void {
  if (values.length === 0) {
    throw new ValidationError('EMPTY_SAMPLE', 'Cannot compute statistics of an empty sample');
  }
}

function assertPaired(x: readonly number[], y: readonly number[]): void {
  if (x.length !== y.length) {
    throw new ValidationError('UNPAIRED_SAMPLE', `Samples must have equal length: ${x.length} vs ${y.length}`);
  }
  if (x.length < 2) {
    throw new ValidationError('EMPTY_SAMPLE', 'At least two paired values are required');
  }
}

export function mean(values: readonly number[]): number {
  assertNonEmpty(values);
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Percentile with linear interpolation between closest ranks
 */
export function percentile(values: readonly number[], p: number): number {
  assertNonEmpty(values);
  const sorted = [...values].sort((a, b) => a - b);
  const rank = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
}

export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  const squares = values.reduce((sum, v) => sum + (v - m) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

export function descriptiveStats(values: readonly number[]): DescriptiveStats {
  assertNonEmpty(values);
  return {
    count: values.length,
    mean: mean(values),
    median: percentile(values, 50),
    std: sampleStd(values),
    min: Math.min(...values),
    max: Math.max(...values),
    q25: percentile(values, 25),
    q75: percentile(values, 75),
  };
}

/**
 * Finite values per group, groups sorted by key (numeric-aware)
 */
export function groupValues<T>(
  items: readonly T[],
  groupOf: (item: T) => string,
  valueOf: (item: T) => number | undefined
): Array<[string, number[]]> {
  const groups = new Map<string, number[]>();
  for (const item of items) {
    const value = valueOf(item);
    if (value === undefined || !Number.isFinite(value)) continue;
    const key = groupOf(item);
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(value);
    } else {
      groups.set(key, [value]);
    }
  }
  return [...groups.entries()].sort(([a], [b]) => a.localeCompare(b, undefined, { numeric: true }));
}

/**
 * Descriptive statistics per group, groups sorted by key
 */
export function groupStatistics<T>(
  items: readonly T[],
  groupOf: (item: T) => string,
  valueOf: (item: T) => number | undefined
): GroupStats[] {
  return groupValues(items, groupOf, valueOf).map(([group, values]) => ({
    group,
    ...descriptiveStats(values),
  }));
}

export function pearson(x: readonly number[], y: readonly number[]): number {
  assertPaired(x, y);
  const mx = mean(x);
  const my = mean(y);
  let covariance = 0;
  let varX = 0;
  let varY = 0;
  for (let i = 0; i < x.length; i++) {
    covariance += (x[i] - mx) * (y[i] - my);
    varX += (x[i] - mx) ** 2;
    varY += (y[i] - my) ** 2;
  }
  if (varX === 0 || varY === 0) {
    return Number.NaN;
  }
  return covariance / Math.sqrt(varX * varY);
}

/**
 * Average ranks (1-based); ties share the mean of their positions
 */
export function rank(values: readonly number[]): number[] {
  const order = values.map((value, index) => ({ value, index })).sort((a, b) => a.value - b.value);
  const ranks = new Array<number>(values.length);
  let i = 0;
  while (i < order.length) {
    let j = i;
    while (j + 1 < order.length && order[j + 1].value === order[i].value) j++;
    const shared = (i + j) / 2 + 1;
    for (let k = i; k <= j; k++) ranks[order[k].index] = shared;
    i = j + 1;
  }
  return ranks;
}

export function spearman(x: readonly number[], y: readonly number[]): number {
  assertPaired(x, y);
  return pearson(rank(x), rank(y));
}

/**
 * Ordinary least squares fit of y = slope * x + intercept
 */
export function linearRegression(x: readonly number[], y: readonly number[]): RegressionResult {
  assertPaired(x, y);
  const mx = mean(x);
  const my = mean(y);
  let sxy = 0;
  let sxx = 0;
  for (let i = 0; i < x.length; i++) {
    sxy += (x[i] - mx) * (y[i] - my);
    sxx += (x[i] - mx) ** 2;
  }
  if (sxx === 0) {
    throw new ValidationError('DEGENERATE_SAMPLE', 'Regression needs at least two distinct x values');
  }
  const slope = sxy / sxx;
  const intercept = my - slope * mx;
  const rValue = pearson(x, y);

  let residuals = 0;
  for (let i = 0; i < x.length; i++) {
    residuals += (y[i] - (slope * x[i] + intercept)) ** 2;
  }
  const stdErr = x.length > 2 ? Math.sqrt(residuals / (x.length - 2) / sxx) : Number.NaN;

  return {
    slope,
    intercept,
    rValue,
    rSquared: Number.isNaN(rValue) ? 0 : rValue * rValue,
    stdErr,
  };
}

/**
 * Cohen's d with pooled sample standard deviation
 */
export function cohensD(group1: readonly number[], group2: readonly number[]): number {
  if (group1.length < 2 || group2.length < 2) {
    throw new ValidationError('EMPTY_SAMPLE', 'Each group needs at least two values');
  }
  const n1 = group1.length;
  const n2 = group2.length;
  const pooled = Math.sqrt(
    ((n1 - 1) * sampleStd(group1) ** 2 + (n2 - 1) * sampleStd(group2) ** 2) / (n1 + n2 - 2)
  );
  return (mean(group1) - mean(group2)) / pooled;
}
