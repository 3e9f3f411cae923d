import { describe, it, expect } from 'vitest';
import { EnergyPredictor } from '../../../src/energy/energy-predictor.js';
import type { EnergyFeatures, TrainingSample } from '../../../src/energy/types.js';
import type { MetricData } from '../../../src/analysis/types.js';
import { InsufficientDataError } from '../../../src/core/errors.js';
import { dailySeries, sleepReadinessWeek, testConfig } from '../../helpers/fixtures.js';

function predictor(): EnergyPredictor {
  return new EnergyPredictor(testConfig().energy);
}

function features(overrides: Partial<EnergyFeatures> = {}): EnergyFeatures {
  return {
    sleepHours: 6,
    deepSleepHours: 0.5,
    readiness: 65,
    dayOfWeek: 3,
    prevDayEnergy: 4,
    meetingHours: 1,
    ...overrides,
  };
}

/** Varied features where energy equals sleep hours exactly */
function linearSamples(count: number): TrainingSample[] {
  return Array.from({ length: count }, (_, i) => {
    const sleepHours = 5 + (i % 5) * 0.5;
    return {
      date: `2026-02-${String(i + 1).padStart(2, '0')}`,
      features: {
        sleepHours,
        deepSleepHours: ((i * 7) % 11) / 10,
        readiness: 60 + ((i * 3) % 13),
        dayOfWeek: i % 7,
        prevDayEnergy: 2 + ((i * 5) % 9),
        meetingHours: (i * 2) % 5,
      },
      energy: sleepHours,
    };
  });
}

describe('EnergyPredictor', () => {
  const week: MetricData = {
    ...sleepReadinessWeek(),
    energy: dailySeries('2026-03-02', [3, null, 2, 3, 4, 5, 4]),
  };

  describe('featuresFor', () => {
    it('builds the feature vector with defaults for optional inputs', () => {
      expect(predictor().featuresFor('2026-03-04', week, new Map([['2026-03-04', 2.5]]))).toEqual({
        sleepHours: 5.5,
        deepSleepHours: 0,
        readiness: 52,
        dayOfWeek: 2,
        prevDayEnergy: 6,
        meetingHours: 2.5,
      });
    });

    it('uses a neutral previous-day energy when nothing earlier was logged', () => {
      expect(predictor().featuresFor('2026-03-02', week, new Map())?.prevDayEnergy).toBe(5);
    });

    it('returns null without sleep or readiness', () => {
      expect(predictor().featuresFor('2026-03-09', week, new Map())).toBeNull();
      expect(predictor().featuresFor('2026-03-02', { sleep_hours: week.sleep_hours }, new Map())).toBeNull();
    });
  });

  describe('extractSamples', () => {
    it('takes logged days before the cutoff on the 1–10 scale', () => {
      const samples = predictor().extractSamples(week, new Map(), '2026-03-06');

      expect(samples.map(s => s.date)).toEqual(['2026-03-02', '2026-03-04', '2026-03-05']);
      expect(samples.map(s => s.energy)).toEqual([6, 4, 6]);
    });
  });

  describe('train and predict', () => {
    it('refuses to fit with fewer than the minimum samples', () => {
      const model = predictor();
      expect(model.train(linearSamples(2))).toBeNull();
      expect(model.isTrained).toBe(false);
      expect(() => model.predict(features())).toThrow(InsufficientDataError);
    });

    it('recovers an exact linear relationship', () => {
      const model = predictor();
      const fit = model.train(linearSamples(20));

      expect(fit?.sampleSize).toBe(20);
      expect(model.rSquared).toBeCloseTo(1, 6);
      expect(model.predict(features())).toEqual({ predicted: 6, confidence: 1, sampleSize: 20 });
    });

    it('clamps predictions to the 1–10 range', () => {
      const model = predictor();
      model.train(linearSamples(20));

      expect(model.predict(features({ sleepHours: 20 })).predicted).toBe(10);
      expect(model.predict(features({ sleepHours: -5 })).predicted).toBe(1);
    });

    it('falls back to the mean with low confidence when energy never varies', () => {
      const model = predictor();
      const flat = linearSamples(10).map(s => ({ ...s, energy: 6 }));
      model.train(flat);

      expect(model.rSquared).toBe(0);
      expect(model.predict(features({ sleepHours: 7 }))).toEqual({ predicted: 6, confidence: 0.2, sampleSize: 10 });
    });
  });
});
