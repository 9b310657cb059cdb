/**
 * Plain-text rendering of a trial analysis for the CLI
 */

import type { TrialAnalysis } from './engine/analysis/trial-analysis.js';
import type { AnovaResult } from './engine/analysis/inference.js';

export function formatPercent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

export function formatNumber(value: number): string {
  return Number.isNaN(value) ? 'n/a' : value.toFixed(4);
}

function formatAnova(result: AnovaResult): string {
  return `F(${result.dfBetween}, ${result.dfWithin}) = ${formatNumber(result.statistic)}, p = ${formatNumber(result.pValue)}`;
}

export function formatAnalysis(analysis: TrialAnalysis): string[] {
  const lines = [
    `🔬 Analysis (${analysis.metric} distance)`,
    `   Trials: ${analysis.totalTrials}, success rate ${formatPercent(analysis.successRate)}`,
  ];

  if (!analysis.overall) {
    lines.push('   No successful trials to analyze.');
    return lines;
  }

  lines.push('', '   By error rate:');
  for (const group of analysis.byErrorRate) {
    const ci = group.ci ? `  95% CI [${formatNumber(group.ci.lower)}, ${formatNumber(group.ci.upper)}]` : '';
    lines.push(
      `   ${group.group.padStart(7)}  n=${group.count}  mean=${formatNumber(group.mean)}  std=${formatNumber(group.std)}${ci}`
    );
  }

  lines.push('', '   By agent:');
  for (const group of analysis.byAgent) {
    lines.push(`   ${group.group.padEnd(8)} n=${group.count}  mean=${formatNumber(group.mean)}`);
  }

  if (analysis.correlation && analysis.regression) {
    const { correlation, regression } = analysis;
    lines.push(
      '',
      `   Pearson r:  ${formatNumber(correlation.pearson)} (p = ${formatNumber(correlation.pearsonPValue)})`,
      `   Spearman ρ: ${formatNumber(correlation.spearman)} (p = ${formatNumber(correlation.spearmanPValue)})`,
      `   Fit:        distance = ${formatNumber(regression.slope)} × rate + ${formatNumber(regression.intercept)} (R² ${formatNumber(regression.rSquared)})`
    );
  }

  const tests: string[] = [];
  if (analysis.rateEffect) tests.push(`   Rate ANOVA:   ${formatAnova(analysis.rateEffect)}`);
  if (analysis.rateVariance) tests.push(`   Levene:       ${formatAnova(analysis.rateVariance)}`);
  if (analysis.agentEffect) tests.push(`   Agent ANOVA:  ${formatAnova(analysis.agentEffect)}`);
  if (analysis.rateContrast) {
    const { lowest, highest, tTest, cohensD } = analysis.rateContrast;
    tests.push(
      `   ${lowest} vs ${highest}: t(${tTest.df}) = ${formatNumber(tTest.statistic)}, p = ${formatNumber(tTest.pValue)}, d = ${formatNumber(cohensD)}`
    );
  }
  if (tests.length > 0) {
    lines.push('', '   Tests:', ...tests);
  }

  if (analysis.sensitivity.length > 0) {
    lines.push('', '   Sensitivity:');
    for (const entry of analysis.sensitivity) {
      const mark = entry.significant ? ' *' : '';
      lines.push(
        `   ${entry.parameter.padEnd(18)} r=${formatNumber(entry.correlation)}  p=${formatNumber(entry.pValue)}${mark}`
      );
    }
  }

  return lines;
}
