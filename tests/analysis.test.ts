import { describe, it, expect } from 'vitest';
import {
  DistanceMetrics,
  cosineDistance,
  euclideanDistance,
  manhattanDistance,
} from '../src/engine/analysis/distance.js';
import { analyzeTrials } from '../src/engine/analysis/trial-analysis.js';
import {
  cohensD,
  descriptiveStats,
  groupStatistics,
  linearRegression,
  pearson,
  rank,
  spearman,
} from '../src/engine/analysis/statistics.js';
import { DimensionMismatchError, ValidationError } from '../src/engine/errors.js';
import type { StoredTrial } from '../src/engine/types/experiment.js';

describe('distance metrics', () => {
  it('gives zero cosine distance for identical vectors', () => {
    expect(cosineDistance([1, 2, 3], [1, 2, 3])).toBe(0);
    expect(cosineDistance([1, 2], [2, 4])).toBeCloseTo(0, 12);
  });

  it('gives cosine distance 2 for opposite vectors', () => {
    expect(cosineDistance([1, 0], [-1, 0])).toBe(2);
  });

  it('gives cosine distance 1 for orthogonal vectors', () => {
    expect(cosineDistance([1, 0], [0, 1])).toBe(1);
  });

  it('computes euclidean and manhattan distances', () => {
    expect(euclideanDistance([0, 0], [3, 4])).toBe(5);
    expect(manhattanDistance([1, 2], [4, -2])).toBe(7);
  });

  it('computes all metrics at once', () => {
    expect(DistanceMetrics.allMetrics([0, 1], [1, 0])).toEqual({
      cosine: 1,
      euclidean: Math.SQRT2,
      manhattan: 2,
    });
  });

  it('rejects vectors of different lengths', () => {
    expect(() => cosineDistance([1, 2], [1, 2, 3])).toThrow(DimensionMismatchError);
    expect(() => euclideanDistance([1], [1, 2])).toThrow(DimensionMismatchError);
    expect(() => manhattanDistance([1, 2, 3], [1])).toThrow(DimensionMismatchError);
  });

  it('gives zero cosine distance between two zero vectors', () => {
    expect(cosineDistance([0, 0], [0, 0])).toBe(0);
    expect(DistanceMetrics.allMetrics([0, 0, 0], [0, 0, 0])).toEqual({ cosine: 0, euclidean: 0, manhattan: 0 });
  });

  it('gives cosine distance 1 between a zero and a non-zero vector', () => {
    expect(cosineDistance([0, 0], [1, 1])).toBe(1);
    expect(cosineDistance([3, -4], [0, 0])).toBe(1);
  });
});

describe('descriptiveStats', () => {
  it('summarizes a sample', () => {
    const stats = descriptiveStats([4, 1, 3, 2]);

    expect(stats.count).toBe(4);
    expect(stats.mean).toBe(2.5);
    expect(stats.median).toBe(2.5);
    expect(stats.min).toBe(1);
    expect(stats.max).toBe(4);
    expect(stats.q25).toBe(1.75);
    expect(stats.q75).toBe(3.25);
    expect(stats.std).toBeCloseTo(Math.sqrt(5 / 3), 12);
  });

  it('reports zero spread for a single value', () => {
    expect(descriptiveStats([7])).toMatchObject({ count: 1, mean: 7, median: 7, std: 0 });
  });

  it('rejects an empty sample', () => {
    expect(() => descriptiveStats([])).toThrow(ValidationError);
  });
});

describe('correlation and regression', () => {
  it('detects perfect linear relations', () => {
    expect(pearson([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 12);
    expect(pearson([1, 2, 3], [3, 2, 1])).toBeCloseTo(-1, 12);
  });

  it('ranks ties by their average position', () => {
    expect(rank([10, 20, 20, 30])).toEqual([1, 2.5, 2.5, 4]);
  });

  it('detects monotonic relations', () => {
    expect(spearman([1, 2, 3, 4], [1, 4, 9, 16])).toBeCloseTo(1, 12);
  });

  it('fits a line', () => {
    const fit = linearRegression([0, 1, 2], [1, 3, 5]);

    expect(fit.slope).toBeCloseTo(2, 12);
    expect(fit.intercept).toBeCloseTo(1, 12);
    expect(fit.rSquared).toBeCloseTo(1, 12);
    expect(fit.stdErr).toBeCloseTo(0, 12);
  });

  it('reports the standard error of the slope', () => {
    const fit = linearRegression([0, 1, 2, 3], [0, 1, 1, 3]);

    expect(fit.slope).toBeCloseTo(0.9, 12);
    expect(fit.stdErr).toBeCloseTo(Math.sqrt(0.07), 12);
    expect(linearRegression([0, 1], [0, 1]).stdErr).toBeNaN();
  });

  it('needs distinct x values to fit', () => {
    expect(() => linearRegression([1, 1, 1], [1, 2, 3])).toThrow(ValidationError);
  });

  it('computes effect size with a pooled deviation', () => {
    expect(cohensD([1, 2, 3], [3, 4, 5])).toBeCloseTo(-2, 12);
  });
});

describe('groupStatistics', () => {
  it('groups values and sorts groups numerically', () => {
    const groups = groupStatistics(
      [
        { key: '10%', value: 2 },
        { key: '5%', value: 1 },
        { key: '10%', value: 4 },
        { key: '5%', value: undefined },
      ],
      (item) => item.key,
      (item) => item.value
    );

    expect(groups.map((g) => [g.group, g.count, g.mean])).toEqual([
      ['5%', 1, 1],
      ['10%', 2, 3],
    ]);
  });
});

describe('analyzeTrials', () => {
  function trial(id: string, rate: number, cosine: number | undefined, agentId = 'echo'): StoredTrial {
    return {
      id,
      sentenceId: 's1',
      sentenceText: 'A sentence used only for analysis tests.',
      agentId,
      errorRateRequested: rate,
      errorRateActual: rate,
      distances: cosine === undefined ? undefined : { cosine, euclidean: cosine * 2, manhattan: cosine * 3 },
      success: cosine !== undefined,
      errorMessage: cosine === undefined ? 'Chain failed at stage 1: down' : undefined,
      chainAttempts: 1,
      createdAt: '2026-01-01T00:00:00.000Z',
    };
  }

  it('summarizes successes, groups and the rate/distance relation', () => {
    const analysis = analyzeTrials([
      trial('t1', 0, 0.1),
      trial('t2', 0.1, 0.2, 'openai'),
      trial('t3', 0.5, 0.6),
      trial('t4', 0.5, undefined),
    ]);

    expect(analysis.totalTrials).toBe(4);
    expect(analysis.successful).toBe(3);
    expect(analysis.failed).toBe(1);
    expect(analysis.successRate).toBe(0.75);
    expect(analysis.metric).toBe('cosine');
    expect(analysis.byErrorRate.map((g) => g.group)).toEqual(['0%', '10%', '50%']);
    expect(analysis.byAgent.map((g) => [g.group, g.count])).toEqual([
      ['echo', 2],
      ['openai', 1],
    ]);
    expect(analysis.correlation?.pearson).toBeCloseTo(1, 12);
    expect(analysis.regression?.slope).toBeCloseTo(1, 12);
    expect(analysis.regression?.intercept).toBeCloseTo(0.1, 12);
  });

  it('uses the requested metric', () => {
    const analysis = analyzeTrials([trial('t1', 0, 0.1), trial('t2', 0.5, 0.3)], 'manhattan');

    expect(analysis.overall?.max).toBeCloseTo(0.9, 12);
  });

  it('tests the rate groups against each other', () => {
    const analysis = analyzeTrials([
      trial('t1', 0, 0.1),
      trial('t2', 0, 0.2),
      trial('t3', 0.5, 0.5),
      trial('t4', 0.5, 0.6),
    ]);

    expect(analysis.byErrorRate[0].ci?.mean).toBeCloseTo(0.15, 12);
    expect(analysis.byErrorRate[0].ci?.upper).toBeCloseTo(0.7853, 3);
    expect(analysis.rateContrast?.lowest).toBe('0%');
    expect(analysis.rateContrast?.highest).toBe('50%');
    expect(analysis.rateContrast?.tTest.df).toBe(2);
    expect(analysis.rateContrast?.tTest.statistic).toBeCloseTo(-5.65685, 4);
    expect(analysis.rateContrast?.cohensD).toBeCloseTo(-5.65685, 4);
    expect(analysis.rateEffect?.statistic).toBeCloseTo(32, 8);
    expect(analysis.rateEffect?.pValue).toBeCloseTo(0.02986, 4);
    expect(analysis.agentEffect).toBeNull();
    expect(analysis.correlation?.pearson).toBeCloseTo(0.97014, 4);
    expect(analysis.regression?.pValue).toBe(analysis.correlation?.pearsonPValue);
    expect(analysis.sensitivity.map((e) => e.parameter)).toEqual([
      'errorRateRequested',
      'errorRateActual',
      'sentenceLength',
    ]);
    expect(analysis.sensitivity[0].correlation).toBeCloseTo(0.97014, 4);
  });

  it('compares agents when more than one produced results', () => {
    const analysis = analyzeTrials([
      trial('t1', 0.5, 0.1, 'echo'),
      trial('t2', 0.5, 0.2, 'echo'),
      trial('t3', 0.5, 0.5, 'openai'),
      trial('t4', 0.5, 0.6, 'openai'),
    ]);

    expect(analysis.agentEffect?.statistic).toBeCloseTo(32, 8);
    expect(analysis.rateEffect).toBeNull();
    expect(analysis.rateContrast).toBeNull();
    expect(analysis.correlation).toBeNull();
  });

  it('handles a store without successful trials', () => {
    const analysis = analyzeTrials([trial('t1', 0.25, undefined)]);

    expect(analysis.overall).toBeNull();
    expect(analysis.correlation).toBeNull();
    expect(analysis.byErrorRate).toEqual([]);
    expect(analysis.successRate).toBe(0);
    expect(analysis.rateEffect).toBeNull();
    expect(analysis.sensitivity).toEqual([]);
  });
});
