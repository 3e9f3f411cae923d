/**
 * Small-sample statistics used by the pattern analyzer and the energy model.
 *
 * All p-values are two-sided and come from the Student t distribution through
 * the regularized incomplete beta function, so they stay accurate for the
 * 5–90 point series the analyzer works with.
 */

export function mean(values: number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Sample variance (n − 1 denominator)
 */
export function variance(values: number[]): number {
  const n = values.length;
  if (n < 2) return 0;
  const m = mean(values);
  return values.reduce((sum, v) => sum + (v - m) * (v - m), 0) / (n - 1);
}

export function stdDev(values: number[]): number {
  return Math.sqrt(variance(values));
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function round(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

// ─── Distribution functions ─────────────────────────────────────────────────

/**
 * Log gamma (Lanczos approximation), valid for x > 0
 */
export function lgamma(x: number): number {
  const cof = [
    76.18009172947146, -86.50532032941677, 24.01409824083091,
    -1.231739572450155, 0.1208650973866179e-2, -0.5395239384953e-5,
  ];

  let y = x;
  let tmp = x + 5.5;
  tmp -= (x + 0.5) * Math.log(tmp);
  let ser = 1.000000000190015;

  for (const c of cof) {
    ser += c / ++y;
  }

  return -tmp + Math.log(2.5066282746310005 * ser / x);
}

/**
 * Continued fraction for the incomplete beta function (modified Lentz)
 */
function betaContinuedFraction(x: number, a: number, b: number): number {
  const maxIter = 200;
  const eps = 3e-14;
  const tiny = 1e-300;

  const qab = a + b;
  const qap = a + 1;
  const qam = a - 1;

  let c = 1;
  let d = 1 - qab * x / qap;
  if (Math.abs(d) < tiny) d = tiny;
  d = 1 / d;
  let h = d;

  for (let m = 1; m <= maxIter; m++) {
    const m2 = 2 * m;

    let aa = m * (b - m) * x / ((qam + m2) * (a + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < tiny) d = tiny;
    c = 1 + aa / c;
    if (Math.abs(c) < tiny) c = tiny;
    d = 1 / d;
    h *= d * c;

    aa = -(a + m) * (qab + m) * x / ((a + m2) * (qap + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < tiny) d = tiny;
    c = 1 + aa / c;
    if (Math.abs(c) < tiny) c = tiny;
    d = 1 / d;
    const delta = d * c;
    h *= delta;

    if (Math.abs(delta - 1) < eps) break;
  }

  return h;
}

/**
 * Regularized incomplete beta I_x(a, b)
 */
export function incompleteBeta(x: number, a: number, b: number): number {
  if (x <= 0) return 0;
  if (x >= 1) return 1;

  const front = Math.exp(
    lgamma(a + b) - lgamma(a) - lgamma(b) + a * Math.log(x) + b * Math.log(1 - x),
  );

  // The fraction converges fast only on this side of the mean; use symmetry otherwise
  if (x < (a + 1) / (a + b + 2)) {
    return front * betaContinuedFraction(x, a, b) / a;
  }
  return 1 - front * betaContinuedFraction(1 - x, b, a) / b;
}

/**
 * Two-sided p-value of a Student t statistic
 */
export function tTestPValue(t: number, df: number): number {
  if (df <= 0 || Number.isNaN(t)) return 1;
  if (!Number.isFinite(t)) return 0;
  return clamp(incompleteBeta(df / (df + t * t), df / 2, 0.5), 0, 1);
}

// ─── Tests and estimators ───────────────────────────────────────────────────

export interface CorrelationResult {
  r: number;
  pValue: number;
  n: number;
}

/**
 * Pearson correlation with its two-sided p-value (t test, n − 2 df).
 * Returns null when fewer than 3 points or either side is constant.
 */
export function pearson(x: number[], y: number[]): CorrelationResult | null {
  const n = Math.min(x.length, y.length);
  if (n < 3) return null;

  const mx = mean(x.slice(0, n));
  const my = mean(y.slice(0, n));

  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = x[i] - mx;
    const dy = y[i] - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }

  if (sxx === 0 || syy === 0) return null;

  const r = clamp(sxy / Math.sqrt(sxx * syy), -1, 1);
  const df = n - 2;
  const denom = 1 - r * r;
  const pValue = denom <= 0 ? 0 : tTestPValue(r * Math.sqrt(df / denom), df);

  return { r, pValue, n };
}

export interface LinearFit {
  slope: number;
  intercept: number;
  /** Correlation between x and y, i.e. the standardized slope */
  r: number;
  pValue: number;
  n: number;
}

/**
 * Ordinary least squares of y on x. The slope p-value equals the p-value of
 * the x/y correlation.
 */
export function linearRegression(x: number[], y: number[]): LinearFit | null {
  const corr = pearson(x, y);
  if (!corr) return null;

  const mx = mean(x);
  const my = mean(y);
  let sxy = 0;
  let sxx = 0;
  for (let i = 0; i < corr.n; i++) {
    sxy += (x[i] - mx) * (y[i] - my);
    sxx += (x[i] - mx) * (x[i] - mx);
  }

  const slope = sxy / sxx;
  return {
    slope,
    intercept: my - slope * mx,
    r: corr.r,
    pValue: corr.pValue,
    n: corr.n,
  };
}

export interface WelchResult {
  t: number;
  df: number;
  pValue: number;
}

/**
 * Welch's t-test for two samples with unequal variances.
 * Positive t means `a` has the higher mean.
 */
export function welchTTest(a: number[], b: number[]): WelchResult {
  const n1 = a.length;
  const n2 = b.length;

  if (n1 < 2 || n2 < 2) {
    return { t: 0, df: 0, pValue: 1 };
  }

  const v1 = variance(a) / n1;
  const v2 = variance(b) / n2;
  const se = Math.sqrt(v1 + v2);
  if (se === 0) {
    return { t: 0, df: n1 + n2 - 2, pValue: 1 };
  }

  const t = (mean(a) - mean(b)) / se;

  // Welch–Satterthwaite
  const denom = (v1 * v1) / (n1 - 1) + (v2 * v2) / (n2 - 1);
  const df = denom > 0 ? ((v1 + v2) * (v1 + v2)) / denom : n1 + n2 - 2;

  return { t, df, pValue: tTestPValue(t, df) };
}

/**
 * Standardized mean difference of `a` over `b` using the pooled SD
 */
export function cohensD(a: number[], b: number[]): number {
  const n1 = a.length;
  const n2 = b.length;
  if (n1 < 2 || n2 < 2) return 0;

  const pooled = Math.sqrt(((n1 - 1) * variance(a) + (n2 - 1) * variance(b)) / (n1 + n2 - 2));
  if (pooled === 0) return 0;
  return (mean(a) - mean(b)) / pooled;
}

// ─── Linear algebra ─────────────────────────────────────────────────────────

/**
 * Cholesky decomposition A = L Lᵀ. Retries with growing diagonal jitter and
 * returns null when A is not positive-definite.
 */
export function choleskyDecompose(A: number[][]): number[][] | null {
  const n = A.length;

  for (const jitter of [0, 1e-8, 1e-6, 1e-4]) {
    const L: number[][] = Array.from({ length: n }, () => new Array<number>(n).fill(0));
    let ok = true;

    for (let i = 0; i < n && ok; i++) {
      for (let j = 0; j <= i; j++) {
        let sum = 0;
        for (let k = 0; k < j; k++) {
          sum += L[i][k] * L[j][k];
        }
        if (i === j) {
          const diag = A[i][i] + jitter - sum;
          if (diag <= 0) {
            ok = false;
            break;
          }
          L[i][j] = Math.sqrt(diag);
        } else {
          L[i][j] = (A[i][j] - sum) / L[j][j];
        }
      }
    }

    if (ok) return L;
  }

  return null;
}

/**
 * Solve L Lᵀ x = b given the Cholesky factor L
 */
export function choleskySolve(L: number[][], b: number[]): number[] {
  const n = L.length;

  const y = new Array<number>(n).fill(0);
  for (let i = 0; i < n; i++) {
    let sum = 0;
    for (let j = 0; j < i; j++) {
      sum += L[i][j] * y[j];
    }
    y[i] = (b[i] - sum) / L[i][i];
  }

  const x = new Array<number>(n).fill(0);
  for (let i = n - 1; i >= 0; i--) {
    let sum = 0;
    for (let j = i + 1; j < n; j++) {
      sum += L[j][i] * x[j];
    }
    x[i] = (y[i] - sum) / L[i][i];
  }

  return x;
}
