import type { LlmEnergyPrediction } from '../gateway/schemas.js';
import type { FailureReason } from '../gateway/types.js';

export const ENERGY_FEATURES = [
  'sleepHours',
  'deepSleepHours',
  'readiness',
  'dayOfWeek',
  'prevDayEnergy',
  'meetingHours',
] as const;

export type EnergyFeatureName = (typeof ENERGY_FEATURES)[number];

export type EnergyFeatures = Record<EnergyFeatureName, number>;

export interface TrainingSample {
  date: string;
  features: EnergyFeatures;
  /** Self-reported energy on the 1–10 scale */
  energy: number;
}

export interface RegressionModel {
  means: number[];
  stds: number[];
  coefficients: number[];
  intercept: number;
  rSquared: number;
  sampleSize: number;
}

export interface RegressionPrediction {
  /** 1–10, one decimal */
  predicted: number;
  confidence: number;
  sampleSize: number;
}

export type PredictionSource = 'regression' | 'llm';

export interface EnergyPrediction {
  date: string;
  source: PredictionSource;
  /** 1–10 */
  overall: number;
  confidence: number;
  /** Fewer labeled days than the regression threshold */
  insufficientData: boolean;
  threshold: number;
  sampleSize: number;
  regression: RegressionPrediction | null;
  /** The model's independent answer (or its fallback), kept as narrative */
  llm: LlmEnergyPrediction;
  llmFailure: FailureReason | null;
  peakHours: string[];
  lowHours: string[];
  suggestion: string;
}

export interface PredictionAccuracy {
  source: PredictionSource;
  mae: number;
  rmse: number;
  correlation: number;
  sampleSize: number;
  periodStart: string;
  periodEnd: string;
}

export interface PredictionComparison {
  regression: PredictionAccuracy | null;
  llm: PredictionAccuracy | null;
  winner: PredictionSource | 'tie' | null;
  summary: string | null;
}
