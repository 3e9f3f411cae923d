import {
  DAILY_BRIEF_SYSTEM,
  DAILY_BRIEF_USER,
  ENERGY_PREDICTION_SYSTEM,
  ENERGY_PREDICTION_USER,
  PATTERN_ANALYST_SYSTEM,
  PATTERN_ANALYST_USER,
  WEEKLY_REVIEW_SYSTEM,
  WEEKLY_REVIEW_USER,
} from '../prompt/templates/personas.js';
import {
  formatCalendar,
  formatDays,
  formatMetricDeltas,
  formatMetricStatistics,
  formatPatterns,
  formatRecentEnergy,
  formatRegression,
  formatStyle,
  formatWeeklyMetrics,
  renderTemplate,
} from '../prompt/render.js';
import type { DailyBriefContext } from '../prompt/types.js';
import { parseJsonPayload, parseTextPayload } from './parse-result.js';
import { LlmEnergyPredictionSchema, LlmPatternListSchema } from './schemas.js';
import {
  DAILY_BRIEF_FALLBACK,
  WEEKLY_REVIEW_FALLBACK,
  energyFallback,
  patternFallback,
} from './fallbacks.js';
import type { PersonaRegistry } from './types.js';

function briefFlags(flags: DailyBriefContext['flags']): string {
  const lines: string[] = [];
  if (flags.shortSleepStreak) lines.push('- Short sleep on at least 2 of the last 3 nights');
  if (flags.heavyCalendar) lines.push('- Heavy meeting load today');
  return lines.length > 0 ? lines.join('\n') : '- None';
}

/**
 * One entry per persona: prompts, output handling and fallback. Callers pick
 * a persona by id; nothing outside this table branches on insight type to
 * build a prompt.
 */
export const PERSONAS: PersonaRegistry = {
  daily_brief_coach: {
    feature: 'daily_brief',
    kind: 'text',
    systemPrompt: DAILY_BRIEF_SYSTEM,
    userTemplate: DAILY_BRIEF_USER,
    temperature: 0.7,
    render(context) {
      return {
        system: renderTemplate(DAILY_BRIEF_SYSTEM, { style: formatStyle(context.personalization) }),
        user: renderTemplate(DAILY_BRIEF_USER, {
          date: context.date,
          dayOfWeek: context.dayOfWeek,
          lookbackDays: String(context.lookbackDays),
          metrics: formatMetricDeltas(context.metrics),
          calendar: formatCalendar(context.calendar),
          patterns: formatPatterns(context.patterns),
          flags: briefFlags(context.flags),
          focusAreas: context.personalization.focusAreas.join(', '),
        }),
      };
    },
    parse: (raw, maxTextLength) => parseTextPayload(raw, maxTextLength),
    fallback: () => DAILY_BRIEF_FALLBACK,
  },

  weekly_reviewer: {
    feature: 'weekly_review',
    kind: 'text',
    systemPrompt: WEEKLY_REVIEW_SYSTEM,
    userTemplate: WEEKLY_REVIEW_USER,
    temperature: 0.7,
    render(context) {
      return {
        system: renderTemplate(WEEKLY_REVIEW_SYSTEM, { style: formatStyle(context.personalization) }),
        user: renderTemplate(WEEKLY_REVIEW_USER, {
          weekStart: context.weekStart,
          weekEnding: context.weekEnding,
          metrics: formatWeeklyMetrics(context.metrics),
          days: formatDays(context.days),
          patterns: formatPatterns(context.patterns),
          focusAreas: context.personalization.focusAreas.join(', '),
        }),
      };
    },
    parse: (raw, maxTextLength) => parseTextPayload(raw, maxTextLength),
    fallback: () => WEEKLY_REVIEW_FALLBACK,
  },

  energy_predictor: {
    feature: 'energy_prediction',
    kind: 'json',
    systemPrompt: ENERGY_PREDICTION_SYSTEM,
    userTemplate: ENERGY_PREDICTION_USER,
    temperature: 0.3,
    render(context) {
      const { morningPerson } = context.personalization;
      return {
        system: renderTemplate(ENERGY_PREDICTION_SYSTEM, { style: formatStyle(context.personalization) }),
        user: renderTemplate(ENERGY_PREDICTION_USER, {
          date: context.date,
          dayOfWeek: context.dayOfWeek,
          metrics: formatMetricDeltas(context.metrics),
          recentEnergy: formatRecentEnergy(context.recentEnergy),
          calendar: formatCalendar(context.calendar),
          patterns: formatPatterns(context.patterns),
          regression: formatRegression(context.regression),
          morningPerson: morningPerson === null ? 'unknown' : morningPerson ? 'yes' : 'no',
        }),
      };
    },
    parse: raw => parseJsonPayload(raw, LlmEnergyPredictionSchema),
    fallback: () => energyFallback(),
  },

  pattern_analyst: {
    feature: 'pattern_analysis',
    kind: 'json',
    systemPrompt: PATTERN_ANALYST_SYSTEM,
    userTemplate: PATTERN_ANALYST_USER,
    temperature: 0.2,
    render(context) {
      return {
        system: PATTERN_ANALYST_SYSTEM,
        user: renderTemplate(PATTERN_ANALYST_USER, {
          windowDays: String(context.windowDays),
          windowEnd: context.windowEnd,
          metrics: formatMetricStatistics(context.metrics),
          patterns: formatPatterns(context.knownPatterns),
        }),
      };
    },
    parse: raw => parseJsonPayload(raw, LlmPatternListSchema),
    fallback: () => patternFallback(),
  },
};
