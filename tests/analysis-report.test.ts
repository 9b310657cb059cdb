import { describe, it, expect } from 'vitest';
import { formatAnalysis, formatNumber, formatPercent } from '../src/analysis-report.js';
import { analyzeTrials } from '../src/engine/analysis/trial-analysis.js';
import type { StoredTrial } from '../src/engine/types/experiment.js';

function trial(id: string, rate: number, cosine: number | undefined): StoredTrial {
  return {
    id,
    sentenceId: 's1',
    sentenceText: 'A sentence used only for report tests.',
    agentId: 'echo',
    errorRateRequested: rate,
    errorRateActual: rate,
    distances: cosine === undefined ? undefined : { cosine, euclidean: cosine, manhattan: cosine },
    success: cosine !== undefined,
    chainAttempts: 1,
    createdAt: '2026-01-01T00:00:00.000Z',
  };
}

describe('formatAnalysis', () => {
  it('formats numbers and rates', () => {
    expect(formatNumber(Number.NaN)).toBe('n/a');
    expect(formatNumber(0.123456)).toBe('0.1235');
    expect(formatPercent(0.25)).toBe('25.0%');
  });

  it('stops after the header when nothing succeeded', () => {
    expect(formatAnalysis(analyzeTrials([trial('t1', 0.25, undefined)]))).toEqual([
      '🔬 Analysis (cosine distance)',
      '   Trials: 1, success rate 0.0%',
      '   No successful trials to analyze.',
    ]);
  });

  it('prints intervals and significance tests', () => {
    const lines = formatAnalysis(
      analyzeTrials([trial('t1', 0, 0.1), trial('t2', 0, 0.2), trial('t3', 0.5, 0.5), trial('t4', 0.5, 0.6)])
    );

    expect(lines).toContain('        0%  n=2  mean=0.1500  std=0.0707  95% CI [-0.4853, 0.7853]');
    expect(lines).toContain('   Rate ANOVA:   F(1, 2) = 32.0000, p = 0.0299');
    expect(lines).toContain('   0% vs 50%: t(2) = -5.6569, p = 0.0299, d = -5.6569');
    expect(lines).toContain('   Sensitivity:');
    expect(lines.some((line) => line.startsWith('   Agent ANOVA'))).toBe(false);
  });
});
