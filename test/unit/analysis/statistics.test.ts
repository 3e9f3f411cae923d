import { describe, it, expect } from 'vitest';
import {
  choleskyDecompose,
  choleskySolve,
  cohensD,
  incompleteBeta,
  linearRegression,
  mean,
  pearson,
  stdDev,
  tTestPValue,
  variance,
  welchTTest,
} from '../../../src/analysis/statistics.js';
import { READINESS_WEEK, SLEEP_WEEK } from '../../helpers/fixtures.js';

describe('descriptive statistics', () => {
  it('uses the sample (n - 1) variance', () => {
    expect(mean([2, 4, 6])).toBe(4);
    expect(variance([2, 4, 6])).toBe(4);
    expect(stdDev([2, 4, 6])).toBe(2);
  });

  it('treats fewer than two values as zero variance', () => {
    expect(variance([5])).toBe(0);
    expect(Number.isNaN(mean([]))).toBe(true);
  });
});

describe('distribution functions', () => {
  it('incompleteBeta is symmetric at the midpoint', () => {
    expect(incompleteBeta(0.5, 2, 2)).toBeCloseTo(0.5, 10);
    expect(incompleteBeta(0, 2, 2)).toBe(0);
    expect(incompleteBeta(1, 2, 2)).toBe(1);
  });

  it('gives p = 1 for t = 0 and p ≈ 0.05 at the critical value', () => {
    expect(tTestPValue(0, 10)).toBeCloseTo(1, 10);
    expect(tTestPValue(2.228, 10)).toBeCloseTo(0.05, 3);
    expect(tTestPValue(-2.228, 10)).toBeCloseTo(0.05, 3);
  });

  it('handles degenerate inputs', () => {
    expect(tTestPValue(3, 0)).toBe(1);
    expect(tTestPValue(Number.NaN, 5)).toBe(1);
    expect(tTestPValue(Number.POSITIVE_INFINITY, 5)).toBe(0);
  });
});

describe('pearson', () => {
  it('finds the sleep and readiness correlation', () => {
    const result = pearson(SLEEP_WEEK, READINESS_WEEK);
    expect(result).not.toBeNull();
    expect(result?.r).toBeCloseTo(0.974, 3);
    expect(result?.pValue).toBeLessThan(0.001);
    expect(result?.n).toBe(7);
  });

  it('is symmetric in its arguments', () => {
    const ab = pearson(SLEEP_WEEK, READINESS_WEEK);
    const ba = pearson(READINESS_WEEK, SLEEP_WEEK);
    expect(ab?.r).toBe(ba?.r);
    expect(ab?.pValue).toBe(ba?.pValue);
  });

  it('returns p = 0 for a perfect line', () => {
    expect(pearson([1, 2, 3, 4], [2, 4, 6, 8])).toEqual({ r: 1, pValue: 0, n: 4 });
  });

  it('returns null for constant series or fewer than three points', () => {
    expect(pearson([1, 2, 3], [5, 5, 5])).toBeNull();
    expect(pearson([1, 2], [3, 4])).toBeNull();
  });
});

describe('linearRegression', () => {
  it('recovers slope and intercept', () => {
    const fit = linearRegression([0, 1, 2, 3], [1, 3, 5, 7]);
    expect(fit?.slope).toBeCloseTo(2, 10);
    expect(fit?.intercept).toBeCloseTo(1, 10);
    expect(fit?.r).toBeCloseTo(1, 10);
  });
});

describe('welchTTest', () => {
  it('reports no difference for identical samples', () => {
    const result = welchTTest([1, 2, 3], [1, 2, 3]);
    expect(result.t).toBe(0);
    expect(result.pValue).toBeCloseTo(1, 10);
  });

  it('signs t by which sample is higher', () => {
    const result = welchTTest([10, 11, 12, 13], [1, 2, 3, 4]);
    expect(result.t).toBeGreaterThan(0);
    expect(result.pValue).toBeLessThan(0.001);
  });

  it('returns p = 1 when a sample is too small', () => {
    expect(welchTTest([1], [1, 2, 3])).toEqual({ t: 0, df: 0, pValue: 1 });
  });
});

describe('cohensD', () => {
  it('divides the mean difference by the pooled SD', () => {
    expect(cohensD([2, 4], [0, 2])).toBeCloseTo(Math.SQRT2, 10);
  });
});

describe('cholesky', () => {
  it('decomposes and solves a positive-definite system', () => {
    const L = choleskyDecompose([[4, 2], [2, 3]]);
    expect(L).not.toBeNull();
    if (!L) return;
    expect(L[0][0]).toBeCloseTo(2, 10);
    expect(L[1][0]).toBeCloseTo(1, 10);
    expect(L[1][1]).toBeCloseTo(Math.SQRT2, 10);

    const x = choleskySolve(L, [2, 1]);
    expect(x[0]).toBeCloseTo(0.5, 10);
    expect(x[1]).toBeCloseTo(0, 10);
  });

  it('returns null for a matrix that is not positive-definite', () => {
    expect(choleskyDecompose([[-1, 0], [0, 1]])).toBeNull();
  });
});
