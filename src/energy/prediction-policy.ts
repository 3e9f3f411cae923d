import type { LlmEnergyPrediction } from '../gateway/schemas.js';
import type { ParseResult } from '../gateway/types.js';
import type { EnergyPrediction, RegressionPrediction } from './types.js';

/** Confidence reported for a model answer used as the prediction */
export const LLM_PREDICTION_CONFIDENCE = 0.5;

export interface ReconcileInput {
  date: string;
  /** Labeled days available for training */
  sampleSize: number;
  threshold: number;
  regression: RegressionPrediction | null;
  llm: ParseResult<LlmEnergyPrediction>;
}

/**
 * At or above the threshold the regression is the prediction and the model
 * output is only narrative. Below it the model output is the prediction,
 * flagged `insufficientData`. The two numbers are never averaged.
 */
export function reconcileEnergyPrediction(input: ReconcileInput): EnergyPrediction {
  const { date, sampleSize, threshold, regression, llm } = input;
  const narrative = llm.status === 'success' ? llm.payload : llm.fallback;
  const llmFailure = llm.status === 'success' ? null : llm.reason;
  const insufficientData = sampleSize < threshold;

  const base = {
    date,
    insufficientData,
    threshold,
    sampleSize,
    regression,
    llm: narrative,
    llmFailure,
    peakHours: narrative.peakHours,
    lowHours: narrative.lowHours,
    suggestion: narrative.suggestion,
  };

  if (!insufficientData && regression) {
    return { ...base, source: 'regression', overall: regression.predicted, confidence: regression.confidence };
  }

  return {
    ...base,
    source: 'llm',
    overall: narrative.overall,
    confidence: llmFailure === null ? LLM_PREDICTION_CONFIDENCE : 0,
  };
}
