/**
 * Plain-text rendering of command results
 */

import type { InsightRecord } from '../insights/types.js';
import type { EnergyPrediction, PredictionAccuracy, PredictionComparison } from '../energy/types.js';
import type { PatternRecord } from '../analysis/types.js';
import type { UsageReport } from '../cost/types.js';
import { formatCost, formatTokens } from '../utils/tokens.js';

const RULE = '  ' + '─'.repeat(40);

const INSIGHT_TITLES: Record<InsightRecord['type'], string> = {
  daily_brief: 'Daily brief',
  weekly_review: 'Weekly review',
  energy_prediction: 'Energy prediction',
};

export function printInsight(insight: InsightRecord): void {
  console.log();
  console.log(`  ${INSIGHT_TITLES[insight.type]} — ${insight.date}`);
  console.log(RULE);
  console.log(`  ${insight.content}`);
  console.log();
  const flags = [`id ${insight.id}`, `confidence ${Math.round(insight.confidence * 100)}%`];
  if (insight.degraded) flags.push(`fallback (${insight.fallbackReason ?? 'unknown'})`);
  console.log(`  ${flags.join(' · ')}`);
  console.log();
}

export function printPrediction(prediction: EnergyPrediction): void {
  console.log();
  console.log(`  Energy forecast — ${prediction.date}`);
  console.log(RULE);
  console.log(`  Overall:    ${prediction.overall.toFixed(1)}/10 (${prediction.source})`);
  console.log(`  Confidence: ${Math.round(prediction.confidence * 100)}%`);
  if (prediction.insufficientData) {
    console.log(`  Data:       ${prediction.sampleSize}/${prediction.threshold} labeled days, not enough for regression`);
  }
  if (prediction.peakHours.length > 0) console.log(`  Peak:       ${prediction.peakHours.join(', ')}`);
  if (prediction.lowHours.length > 0) console.log(`  Low:        ${prediction.lowHours.join(', ')}`);
  console.log(`  ${prediction.suggestion}`);
  console.log();
}

function accuracyLine(label: string, accuracy: PredictionAccuracy | null): string {
  if (!accuracy) return `  ${label}: not enough scored days`;
  return `  ${label}: MAE ${accuracy.mae.toFixed(2)}, RMSE ${accuracy.rmse.toFixed(2)}, ` +
    `r ${accuracy.correlation.toFixed(2)} over ${accuracy.sampleSize} days`;
}

export function printComparison(comparison: PredictionComparison): void {
  console.log();
  console.log(accuracyLine('Regression', comparison.regression));
  console.log(accuracyLine('Model     ', comparison.llm));
  if (comparison.summary) console.log(`  ${comparison.summary}`);
  console.log();
}

export function printPatterns(patterns: PatternRecord[]): void {
  console.log();
  if (patterns.length === 0) {
    console.log('  No active patterns');
    console.log();
    return;
  }
  for (const pattern of patterns) {
    const marker = pattern.actionable ? '*' : ' ';
    console.log(`  ${marker} ${pattern.name}`);
    console.log(`    ${pattern.description}`);
    console.log(
      `    strength ${pattern.strength.toFixed(2)} · confidence ${Math.round(pattern.confidence * 100)}% · ` +
      `n=${pattern.sampleSize} · ${pattern.source}`,
    );
  }
  console.log();
}

export function printUsageReport(report: UsageReport): void {
  console.log();
  console.log(`  LLM usage — last ${report.periodDays} days`);
  console.log(RULE);
  console.log(`  Calls:  ${report.totals.calls}`);
  console.log(`  Tokens: ${formatTokens(report.totals.totalTokens)}`);
  console.log(`  Cost:   ${formatCost(report.totals.costUsd)}`);
  if (report.mostUsedModel) console.log(`  Model:  ${report.mostUsedModel}`);
  if (report.byFeature.length > 0) {
    console.log();
    for (const feature of report.byFeature) {
      console.log(
        `  ${feature.feature.padEnd(18)} ${String(feature.calls).padStart(4)} calls  ` +
        `${formatTokens(feature.totalTokens).padStart(7)}  ${formatCost(feature.costUsd)}`,
      );
    }
  }
  console.log();
}
