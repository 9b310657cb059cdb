import { describe, it, expect } from 'vitest';
import {
  anovaOneWay,
  confidenceInterval,
  correlationTest,
  leveneTest,
  sensitivityAnalysis,
  tTestIndependent,
} from '../src/engine/analysis/inference.js';
import { ValidationError } from '../src/engine/errors.js';

describe('confidenceInterval', () => {
  it('uses the t distribution around the mean', () => {
    const ci = confidenceInterval([1, 2, 3, 4, 5]);

    expect(ci.mean).toBe(3);
    expect(ci.confidence).toBe(0.95);
    expect(ci.lower).toBeCloseTo(1.03676, 4);
    expect(ci.upper).toBeCloseTo(4.96324, 4);
  });

  it('narrows for a lower confidence', () => {
    const wide = confidenceInterval([1, 2, 3, 4, 5], 0.99);
    const narrow = confidenceInterval([1, 2, 3, 4, 5], 0.8);

    expect(narrow.upper - narrow.lower).toBeLessThan(wide.upper - wide.lower);
  });

  it('needs two values and a confidence inside (0, 1)', () => {
    expect(() => confidenceInterval([1])).toThrow(ValidationError);
    expect(() => confidenceInterval([1, 2], 1)).toThrow(ValidationError);
    expect(() => confidenceInterval([1, 2], 0)).toThrow(ValidationError);
  });
});

describe('tTestIndependent', () => {
  it('compares means with a pooled variance', () => {
    const result = tTestIndependent([1, 2, 3, 4, 5], [3, 4, 5, 6, 7]);

    expect(result.statistic).toBeCloseTo(-2, 12);
    expect(result.df).toBe(8);
    expect(result.pValue).toBeCloseTo(0.0805, 3);
  });

  it('is undefined when neither group varies', () => {
    const result = tTestIndependent([1, 1], [1, 1]);

    expect(result.statistic).toBeNaN();
    expect(result.pValue).toBeNaN();
  });

  it('needs two values per group', () => {
    expect(() => tTestIndependent([1], [2, 3])).toThrow(ValidationError);
  });
});

describe('anovaOneWay', () => {
  it('computes the F statistic and its tail probability', () => {
    const result = anovaOneWay([
      [1, 2, 3],
      [3, 4, 5],
      [5, 6, 7],
    ]);

    expect(result.statistic).toBeCloseTo(12, 10);
    expect(result.dfBetween).toBe(2);
    expect(result.dfWithin).toBe(6);
    expect(result.pValue).toBeCloseTo(0.008, 6);
  });

  it('agrees with the t-test for two groups', () => {
    const anova = anovaOneWay([
      [1, 2, 3, 4, 5],
      [3, 4, 5, 6, 7],
    ]);
    const tTest = tTestIndependent([1, 2, 3, 4, 5], [3, 4, 5, 6, 7]);

    expect(anova.statistic).toBeCloseTo(4, 10);
    expect(anova.pValue).toBeCloseTo(tTest.pValue, 10);
  });

  it('needs two groups and more values than groups', () => {
    expect(() => anovaOneWay([[1, 2, 3]])).toThrow(ValidationError);
    expect(() => anovaOneWay([[1], [2]])).toThrow(ValidationError);
    expect(() => anovaOneWay([[1, 2], []])).toThrow(ValidationError);
  });
});

describe('leveneTest', () => {
  it('tests spread around the group medians', () => {
    const result = leveneTest([
      [1, 2, 3],
      [2, 4, 6],
    ]);

    expect(result.statistic).toBeCloseTo(0.8, 10);
    expect(result.dfBetween).toBe(1);
    expect(result.dfWithin).toBe(4);
  });

  it('finds no difference between equally spread groups', () => {
    const result = leveneTest([
      [1, 2, 3],
      [4, 5, 6],
    ]);

    expect(result.statistic).toBe(0);
    expect(result.pValue).toBeCloseTo(1, 12);
  });
});

describe('correlationTest', () => {
  const x = [1, 2, 3, 4, 5];
  const y = [2, 1, 4, 3, 5];

  it('tests the coefficient against zero', () => {
    const result = correlationTest(x, y);

    expect(result.coefficient).toBeCloseTo(0.8, 12);
    expect(result.pValue).toBeCloseTo(0.104, 2);
  });

  it('supports rank correlation', () => {
    expect(correlationTest(x, y, 'spearman').coefficient).toBeCloseTo(0.8, 12);
  });

  it('reports p = 0 for a perfect relation and NaN for a constant', () => {
    expect(correlationTest(x, [2, 4, 6, 8, 10]).pValue).toBe(0);
    expect(correlationTest(x, [7, 7, 7, 7, 7]).pValue).toBeNaN();
    expect(correlationTest([1, 2], [3, 4]).pValue).toBeNaN();
  });
});

describe('sensitivityAnalysis', () => {
  const rows = [1, 2, 3, 4, 5].map((x, i) => ({ x, noisy: [2, 1, 4, 3, 5][i], constant: 7 }));

  it('ranks parameters by the strength of their correlation', () => {
    const entries = sensitivityAnalysis(rows, (row) => row.x * 2, {
      constant: (row) => row.constant,
      noisy: (row) => row.noisy,
      same: (row) => row.x,
    });

    expect(entries.map((e) => [e.parameter, e.significant])).toEqual([
      ['same', true],
      ['noisy', false],
      ['constant', false],
    ]);
    expect(entries[0].correlation).toBeCloseTo(1, 12);
    expect(entries[1].absCorrelation).toBeCloseTo(0.8, 12);
    expect(entries[2].correlation).toBeNaN();
  });

  it('needs at least three rows', () => {
    expect(sensitivityAnalysis(rows.slice(0, 2), (row) => row.x, { same: (row) => row.x })).toEqual([]);
  });
});
