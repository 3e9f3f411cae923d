import { pearson, round } from '../analysis/statistics.js';
import type { PredictionAccuracy, PredictionComparison, PredictionSource } from './types.js';

const MIN_PAIRS = 3;

/**
 * Scores regression and model predictions against the energy actually
 * reported on the same days (all on the 1–10 scale).
 */
export class PredictionComparator {
  private predictions: Record<PredictionSource, Map<string, number>> = {
    regression: new Map(),
    llm: new Map(),
  };
  private actuals = new Map<string, number>();

  record(source: PredictionSource, date: string, predicted: number): void {
    this.predictions[source].set(date, predicted);
  }

  recordActual(date: string, energy: number): void {
    this.actuals.set(date, energy);
  }

  accuracy(source: PredictionSource): PredictionAccuracy | null {
    const pairs: Array<{ date: string; predicted: number; actual: number }> = [];
    for (const [date, predicted] of this.predictions[source]) {
      const actual = this.actuals.get(date);
      if (actual !== undefined) pairs.push({ date, predicted, actual });
    }
    if (pairs.length < MIN_PAIRS) return null;

    const errors = pairs.map(p => p.predicted - p.actual);
    const mae = errors.reduce((sum, e) => sum + Math.abs(e), 0) / errors.length;
    const rmse = Math.sqrt(errors.reduce((sum, e) => sum + e * e, 0) / errors.length);
    const corr = pearson(pairs.map(p => p.predicted), pairs.map(p => p.actual));
    const dates = pairs.map(p => p.date).sort();

    return {
      source,
      mae: round(mae, 2),
      rmse: round(rmse, 2),
      correlation: round(corr?.r ?? 0, 2),
      sampleSize: pairs.length,
      periodStart: dates[0],
      periodEnd: dates[dates.length - 1],
    };
  }

  compare(): PredictionComparison {
    const regression = this.accuracy('regression');
    const llm = this.accuracy('llm');

    if (!regression || !llm) {
      return { regression, llm, winner: null, summary: null };
    }
    if (regression.mae < llm.mae) {
      return { regression, llm, winner: 'regression', summary: `Regression beats the model by ${(llm.mae - regression.mae).toFixed(2)} MAE` };
    }
    if (llm.mae < regression.mae) {
      return { regression, llm, winner: 'llm', summary: `The model beats regression by ${(regression.mae - llm.mae).toFixed(2)} MAE` };
    }
    return { regression, llm, winner: 'tie', summary: 'Both sources have equal MAE' };
  }
}
