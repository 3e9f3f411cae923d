/**
 * EnergyPredictor: small linear model of self-reported energy
 *
 * Features are standardized, the intercept is the target mean, and the
 * coefficients come from the normal equations with a tiny ridge term solved
 * by Cholesky. Interpretable by design: one weight per feature.
 */

import { getLogger } from '../core/logger.js';
import { InsufficientDataError } from '../core/errors.js';
import type { EnergyConfig } from '../core/types.js';
import type { MetricData } from '../analysis/types.js';
import { choleskyDecompose, choleskySolve, clamp, mean, round } from '../analysis/statistics.js';
import { weekdayIndex } from '../utils/dates.js';
import {
  ENERGY_FEATURES,
  type EnergyFeatures,
  type RegressionModel,
  type RegressionPrediction,
  type TrainingSample,
} from './types.js';

/** Self-reported energy is logged 1–5; the model works on 1–10 */
export const ENERGY_SCALE = 2;

const DEFAULT_PREV_ENERGY = 5;

function finiteValues(data: MetricData, metric: string): Map<string, number> {
  const out = new Map<string, number>();
  for (const point of data[metric] ?? []) {
    if (typeof point.value === 'number' && Number.isFinite(point.value)) {
      out.set(point.date, point.value);
    }
  }
  return out;
}

/** Monday = 0 … Sunday = 6 */
function mondayIndex(date: string): number {
  return (weekdayIndex(date) + 6) % 7;
}

function previousDate(dates: string[], date: string): string | undefined {
  let prev: string | undefined;
  for (const d of dates) {
    if (d >= date) break;
    prev = d;
  }
  return prev;
}

export class EnergyPredictor {
  private logger = getLogger().child({ component: 'energy-predictor' });
  private model: RegressionModel | null = null;

  constructor(private readonly config: EnergyConfig) {}

  get isTrained(): boolean {
    return this.model !== null;
  }

  get sampleSize(): number {
    return this.model?.sampleSize ?? 0;
  }

  get rSquared(): number | null {
    return this.model?.rSquared ?? null;
  }

  /**
   * Feature vector for `date`, or null when sleep or readiness is missing.
   * Previous-day energy is the closest earlier logged day on the 1–10 scale.
   */
  featuresFor(date: string, data: MetricData, meetingHours: Map<string, number>): EnergyFeatures | null {
    const sleep = finiteValues(data, 'sleep_hours').get(date);
    const readiness = finiteValues(data, 'readiness').get(date);
    if (sleep === undefined || readiness === undefined) return null;

    const energy = finiteValues(data, 'energy');
    const energyDates = [...energy.keys()].sort();
    const prev = previousDate(energyDates, date);
    const prevEnergy = prev !== undefined ? energy.get(prev) : undefined;

    return {
      sleepHours: sleep,
      deepSleepHours: finiteValues(data, 'deep_sleep_hours').get(date) ?? 0,
      readiness,
      dayOfWeek: mondayIndex(date),
      prevDayEnergy: prevEnergy !== undefined ? prevEnergy * ENERGY_SCALE : DEFAULT_PREV_ENERGY,
      meetingHours: meetingHours.get(date) ?? 0,
    };
  }

  /**
   * Labeled samples strictly before `before`: days with an energy log and
   * both sleep and readiness readings.
   */
  extractSamples(data: MetricData, meetingHours: Map<string, number>, before: string): TrainingSample[] {
    const energy = finiteValues(data, 'energy');
    const samples: TrainingSample[] = [];

    for (const date of [...energy.keys()].sort()) {
      if (date >= before) break;
      const features = this.featuresFor(date, data, meetingHours);
      const level = energy.get(date);
      if (!features || level === undefined) continue;
      samples.push({ date, features, energy: level * ENERGY_SCALE });
    }

    return samples;
  }

  /**
   * Fit the model. Returns null (and keeps no model) when there are too few
   * samples or the system cannot be solved.
   */
  train(samples: TrainingSample[]): RegressionModel | null {
    this.model = null;
    if (samples.length < this.config.minFitSamples) {
      this.logger.debug({ samples: samples.length }, 'Too few samples to fit energy model');
      return null;
    }

    const k = ENERGY_FEATURES.length;
    const rows = samples.map(s => ENERGY_FEATURES.map(name => s.features[name]));
    const y = samples.map(s => s.energy);

    const means = ENERGY_FEATURES.map((_, j) => mean(rows.map(r => r[j])));
    const stds = ENERGY_FEATURES.map((_, j) => {
      const sd = Math.sqrt(mean(rows.map(r => (r[j] - means[j]) ** 2)));
      return sd > 0 ? sd : 1;
    });
    const Z = rows.map(r => r.map((v, j) => (v - means[j]) / stds[j]));
    const yMean = mean(y);
    const yc = y.map(v => v - yMean);

    const XtX: number[][] = Array.from({ length: k }, (_, i) =>
      Array.from({ length: k }, (_, j) =>
        Z.reduce((sum, z) => sum + z[i] * z[j], 0) + (i === j ? this.config.ridgeLambda : 0),
      ),
    );
    const Xty = Array.from({ length: k }, (_, i) => Z.reduce((sum, z, n) => sum + z[i] * yc[n], 0));

    const L = choleskyDecompose(XtX);
    if (!L) {
      this.logger.warn({ samples: samples.length }, 'Energy model normal equations not positive-definite');
      return null;
    }
    const coefficients = choleskySolve(L, Xty);

    const fitted = Z.map(z => yMean + z.reduce((sum, v, j) => sum + v * coefficients[j], 0));
    const ssRes = y.reduce((sum, v, n) => sum + (v - fitted[n]) ** 2, 0);
    const ssTot = yc.reduce((sum, v) => sum + v * v, 0);
    const rSquared = ssTot > 0 ? clamp(1 - ssRes / ssTot, 0, 1) : 0;

    this.model = { means, stds, coefficients, intercept: yMean, rSquared, sampleSize: samples.length };
    this.logger.debug({ samples: samples.length, rSquared }, 'Energy model trained');
    return this.model;
  }

  predict(features: EnergyFeatures): RegressionPrediction {
    const model = this.model;
    if (!model) {
      throw new InsufficientDataError('Energy model is not trained', this.config.minFitSamples, 0);
    }

    const raw = ENERGY_FEATURES.reduce(
      (sum, name, j) => sum + ((features[name] - model.means[j]) / model.stds[j]) * model.coefficients[j],
      model.intercept,
    );

    return {
      predicted: round(clamp(raw, 1, 10), 1),
      confidence: round(clamp(0.2 + 0.8 * model.rSquared, 0, 1), 2),
      sampleSize: model.sampleSize,
    };
  }
}
