import type { LlmEnergyPrediction, LlmPattern } from './schemas.js';

export const DAILY_BRIEF_FALLBACK =
  "Your daily brief isn't available right now. Check your sleep and readiness numbers directly, " +
  'and take it easy today if they look low.';

export const WEEKLY_REVIEW_FALLBACK =
  "Your weekly review isn't available right now. This week's data is saved and the review can be " +
  'regenerated later.';

export const ENERGY_PREDICTION_FALLBACK: Readonly<LlmEnergyPrediction> = Object.freeze({
  overall: 5,
  peakHours: [],
  lowHours: [],
  suggestion: 'Prediction unavailable, trust your gut.',
});

export function energyFallback(): LlmEnergyPrediction {
  return {
    ...ENERGY_PREDICTION_FALLBACK,
    peakHours: [],
    lowHours: [],
  };
}

export function patternFallback(): LlmPattern[] {
  return [];
}
