/**
 * Analysis of stored trials
 *
 * Descriptive summaries per error rate / agent, the relation between
 * corruption level and semantic distance, and significance tests across
 * rate and agent groups.
 */

import type { DistanceMetric } from './distance.js';
import type { StoredTrial } from '../types/experiment.js';
import {
  cohensD,
  descriptiveStats,
  groupValues,
  linearRegression,
  type DescriptiveStats,
  type GroupStats,
  type RegressionResult,
} from './statistics.js';
import {
  anovaOneWay,
  confidenceInterval,
  correlationTest,
  leveneTest,
  sensitivityAnalysis,
  tTestIndependent,
  type AnovaResult,
  type ConfidenceInterval,
  type SensitivityEntry,
  type TTestResult,
} from './inference.js';

export interface GroupSummary extends GroupStats {
  ci: ConfidenceInterval | null;    // 95% interval of the mean, null below two values
}

export interface RateContrast {
  lowest: string;
  highest: string;
  tTest: TTestResult;
  cohensD: number;
}

export interface TrialAnalysis {
  totalTrials: number;
  successful: number;
  failed: number;
  successRate: number;
  metric: DistanceMetric;
  overall: DescriptiveStats | null;
  byErrorRate: GroupSummary[];
  byAgent: GroupSummary[];
  correlation: {
    pearson: number;
    spearman: number;
    pearsonPValue: number;
    spearmanPValue: number;
  } | null;
  regression: (RegressionResult & { pValue: number }) | null;
  rateEffect: AnovaResult | null;
  rateVariance: AnovaResult | null;
  agentEffect: AnovaResult | null;
  rateContrast: RateContrast | null;
  sensitivity: SensitivityEntry[];
}

function formatRate(rate: number): string {
  return `${Math.round(rate * 1000) / 10}%`;
}

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

function summarize(groups: Array<[string, number[]]>): GroupSummary[] {
  return groups.map(([group, values]) => ({
    group,
    ...descriptiveStats(values),
    ci: values.length >= 2 ? confidenceInterval(values) : null,
  }));
}

/** ANOVA when at least two groups exist and some group has a spread */
function groupEffect(groups: Array<[string, number[]]>, test = anovaOneWay): AnovaResult | null {
  const samples = groups.map(([, values]) => values);
  const total = samples.reduce((sum, values) => sum + values.length, 0);
  return samples.length >= 2 && total > samples.length ? test(samples) : null;
}

/** Lowest vs highest requested rate, when both have at least two values */
function contrast(groups: Array<[string, number[]]>): RateContrast | null {
  const usable = groups.filter(([, values]) => values.length >= 2);
  if (usable.length < 2) return null;
  const [lowest, low] = usable[0];
  const [highest, high] = usable[usable.length - 1];
  return { lowest, highest, tTest: tTestIndependent(low, high), cohensD: cohensD(low, high) };
}

/**
 * Summary of a trial set: success counts, distance statistics per requested
 * error rate and per agent, and how distance tracks the actual error rate
 */
export function analyzeTrials(
  trials: readonly StoredTrial[],
  metric: DistanceMetric = 'cosine'
): TrialAnalysis {
  const successful = trials.filter((t) => t.success && t.distances !== undefined);
  const distanceOf = (t: StoredTrial): number => t.distances?.[metric] ?? Number.NaN;
  const actualRateOf = (t: StoredTrial): number => t.errorRateActual ?? t.errorRateRequested;

  const distances = successful.map(distanceOf);
  const rates = successful.map(actualRateOf);

  let correlation: TrialAnalysis['correlation'] = null;
  let regression: TrialAnalysis['regression'] = null;
  if (distances.length >= 2 && new Set(rates).size >= 2) {
    const byPearson = correlationTest(rates, distances, 'pearson');
    const bySpearman = correlationTest(rates, distances, 'spearman');
    correlation = {
      pearson: byPearson.coefficient,
      spearman: bySpearman.coefficient,
      pearsonPValue: byPearson.pValue,
      spearmanPValue: bySpearman.pValue,
    };
    regression = { ...linearRegression(rates, distances), pValue: byPearson.pValue };
  }

  const rateGroups = groupValues(successful, (t) => formatRate(t.errorRateRequested), distanceOf);
  const agentGroups = groupValues(successful, (t) => t.agentId, distanceOf);
  const successCount = trials.filter((t) => t.success).length;

  return {
    totalTrials: trials.length,
    successful: successCount,
    failed: trials.length - successCount,
    successRate: trials.length === 0 ? 0 : successCount / trials.length,
    metric,
    overall: distances.length > 0 ? descriptiveStats(distances) : null,
    byErrorRate: summarize(rateGroups),
    byAgent: summarize(agentGroups),
    correlation,
    regression,
    rateEffect: groupEffect(rateGroups),
    rateVariance: groupEffect(rateGroups, leveneTest),
    agentEffect: groupEffect(agentGroups),
    rateContrast: contrast(rateGroups),
    sensitivity: sensitivityAnalysis(successful, distanceOf, {
      errorRateRequested: (t) => t.errorRateRequested,
      errorRateActual: actualRateOf,
      sentenceLength: (t) => wordCount(t.sentenceText),
    }),
  };
}
