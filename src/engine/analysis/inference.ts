/**
 * Inferential statistics: confidence intervals, significance tests and
 * parameter sensitivity.
 *
 * Test statistics are computed here; tail probabilities and quantiles come
 * from the stdlib t and F distributions.
 */

import tCdf from '@stdlib/stats-base-dists-t-cdf';
import tQuantile from '@stdlib/stats-base-dists-t-quantile';
import fCdf from '@stdlib/stats-base-dists-f-cdf';
import { ValidationError } from '../errors.js';
import { mean, pearson, percentile, sampleStd, spearman } from './statistics.js';

export const SIGNIFICANCE_LEVEL = 0.05;

export interface ConfidenceInterval {
  mean: number;
  lower: number;
  upper: number;
  confidence: number;
}

export interface TestResult {
  statistic: number;
  pValue: number;
}

export interface TTestResult extends TestResult {
  df: number;
}

export interface AnovaResult extends TestResult {
  dfBetween: number;
  dfWithin: number;
}

export interface CorrelationTest {
  coefficient: number;
  pValue: number;
}

export type CorrelationMethod = 'pearson' | 'spearman';

export interface SensitivityEntry {
  parameter: string;
  correlation: number;
  absCorrelation: number;
  pValue: number;
  significant: boolean;
}

/** Two-sided p-value of a t statistic */
function twoSidedT(statistic: number, df: number): number {
  if (Number.isNaN(statistic) || df <= 0) return Number.NaN;
  if (!Number.isFinite(statistic)) return 0;
  return 2 * (1 - tCdf(Math.abs(statistic), df));
}

/**
 * Interval for the mean from the t distribution with n - 1 degrees of freedom
 */
export function confidenceInterval(values: readonly number[], confidence = 0.95): ConfidenceInterval {
  if (values.length < 2) {
    throw new ValidationError('EMPTY_SAMPLE', 'A confidence interval needs at least two values');
  }
  if (!(confidence > 0 && confidence < 1)) {
    throw new ValidationError('INVALID_CONFIDENCE', `Confidence must be between 0 and 1, got ${confidence}`);
  }
  const m = mean(values);
  const standardError = sampleStd(values) / Math.sqrt(values.length);
  const margin = standardError * tQuantile((1 + confidence) / 2, values.length - 1);
  return { mean: m, lower: m - margin, upper: m + margin, confidence };
}

/**
 * Student's t-test for two independent samples (pooled variance).
 * Statistic and p-value are NaN when both samples have zero variance.
 */
export function tTestIndependent(group1: readonly number[], group2: readonly number[]): TTestResult {
  if (group1.length < 2 || group2.length < 2) {
    throw new ValidationError('EMPTY_SAMPLE', 'Each group needs at least two values');
  }
  const n1 = group1.length;
  const n2 = group2.length;
  const df = n1 + n2 - 2;
  const pooledVariance = ((n1 - 1) * sampleStd(group1) ** 2 + (n2 - 1) * sampleStd(group2) ** 2) / df;
  const standardError = Math.sqrt(pooledVariance * (1 / n1 + 1 / n2));

  if (standardError === 0) {
    return { statistic: Number.NaN, pValue: Number.NaN, df };
  }
  const statistic = (mean(group1) - mean(group2)) / standardError;
  return { statistic, pValue: twoSidedT(statistic, df), df };
}

/**
 * One-way ANOVA F-test across two or more groups
 */
export function anovaOneWay(groups: ReadonlyArray<readonly number[]>): AnovaResult {
  if (groups.length < 2 || groups.some((g) => g.length === 0)) {
    throw new ValidationError('EMPTY_SAMPLE', 'ANOVA needs at least two non-empty groups');
  }
  const total = groups.reduce((sum, g) => sum + g.length, 0);
  const dfBetween = groups.length - 1;
  const dfWithin = total - groups.length;
  if (dfWithin < 1) {
    throw new ValidationError('EMPTY_SAMPLE', 'ANOVA needs more values than groups');
  }

  const grandMean = mean(groups.flat());
  let ssBetween = 0;
  let ssWithin = 0;
  for (const group of groups) {
    const groupMean = mean(group);
    ssBetween += group.length * (groupMean - grandMean) ** 2;
    for (const value of group) ssWithin += (value - groupMean) ** 2;
  }

  const msWithin = ssWithin / dfWithin;
  if (msWithin === 0) {
    return { statistic: Number.NaN, pValue: Number.NaN, dfBetween, dfWithin };
  }
  const statistic = ssBetween / dfBetween / msWithin;
  return { statistic, pValue: 1 - fCdf(statistic, dfBetween, dfWithin), dfBetween, dfWithin };
}

/**
 * Levene's test for equal variances, centred on group medians
 * (the Brown-Forsythe variant)
 */
export function leveneTest(groups: ReadonlyArray<readonly number[]>): AnovaResult {
  const deviations = groups.map((group) => {
    const median = group.length > 0 ? percentile(group, 50) : 0;
    return group.map((value) => Math.abs(value - median));
  });
  return anovaOneWay(deviations);
}

/**
 * Correlation coefficient with a two-sided p-value (t test on r, n - 2 df)
 */
export function correlationTest(
  x: readonly number[],
  y: readonly number[],
  method: CorrelationMethod = 'pearson'
): CorrelationTest {
  const coefficient = method === 'pearson' ? pearson(x, y) : spearman(x, y);
  const df = x.length - 2;
  if (Number.isNaN(coefficient) || df <= 0) {
    return { coefficient, pValue: Number.NaN };
  }
  if (Math.abs(coefficient) >= 1) {
    return { coefficient, pValue: 0 };
  }
  const statistic = coefficient * Math.sqrt(df / (1 - coefficient * coefficient));
  return { coefficient, pValue: twoSidedT(statistic, df) };
}

/**
 * Pearson correlation of every parameter with the target, strongest first
 */
export function sensitivityAnalysis<T>(
  rows: readonly T[],
  target: (row: T) => number,
  parameters: Record<string, (row: T) => number>
): SensitivityEntry[] {
  if (rows.length < 3) return [];
  const y = rows.map(target);

  return Object.entries(parameters)
    .map(([parameter, valueOf]) => {
      const { coefficient, pValue } = correlationTest(rows.map(valueOf), y);
      return {
        parameter,
        correlation: coefficient,
        absCorrelation: Math.abs(coefficient),
        pValue,
        significant: pValue < SIGNIFICANCE_LEVEL,
      };
    })
    .sort((a, b) => {
      // Undefined correlations (constant parameter) go last
      const left = Number.isNaN(a.absCorrelation) ? -1 : a.absCorrelation;
      const right = Number.isNaN(b.absCorrelation) ? -1 : b.absCorrelation;
      return right - left;
    });
}
