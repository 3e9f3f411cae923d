export { EnergyPredictor, ENERGY_SCALE } from './energy-predictor.js';
export { reconcileEnergyPrediction, LLM_PREDICTION_CONFIDENCE } from './prediction-policy.js';
export type { ReconcileInput } from './prediction-policy.js';
export { PredictionComparator } from './comparator.js';
export { ENERGY_FEATURES } from './types.js';
export type {
  EnergyFeatureName,
  EnergyFeatures,
  EnergyPrediction,
  PredictionAccuracy,
  PredictionComparison,
  PredictionSource,
  RegressionModel,
  RegressionPrediction,
  TrainingSample,
} from './types.js';
