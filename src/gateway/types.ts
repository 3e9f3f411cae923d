import type { VitalsenseError } from '../core/errors.js';
import type { TokenUsageRecord } from '../cost/types.js';
import type {
  DailyBriefContext,
  EnergyPredictionContext,
  PatternAnalysisContext,
  WeeklyReviewContext,
} from '../prompt/types.js';
import type { LlmEnergyPrediction, LlmPattern } from './schemas.js';

export type PersonaId = 'daily_brief_coach' | 'weekly_reviewer' | 'energy_predictor' | 'pattern_analyst';

export type FailureReason = 'timeout' | 'provider_error' | 'parse_error';

/** Typed context each persona renders */
export interface PersonaContexts {
  daily_brief_coach: DailyBriefContext;
  weekly_reviewer: WeeklyReviewContext;
  energy_predictor: EnergyPredictionContext;
  pattern_analyst: PatternAnalysisContext;
}

/** Payload each persona produces */
export interface PersonaPayloads {
  daily_brief_coach: string;
  weekly_reviewer: string;
  energy_predictor: LlmEnergyPrediction;
  pattern_analyst: LlmPattern[];
}

/** Usage feature tag; also the key of the per-feature token limit */
export type GatewayFeature = 'daily_brief' | 'weekly_review' | 'energy_prediction' | 'pattern_analysis';

export interface ParseSuccess<T> {
  status: 'success';
  payload: T;
  raw: string;
  usage: TokenUsageRecord;
}

export interface ParseFailure<T> {
  status: 'failure';
  reason: FailureReason;
  /** Model output when there was any (parse failures) */
  raw: string | null;
  /** Documented substitute for the payload */
  fallback: T;
  error: VitalsenseError;
  usage: TokenUsageRecord;
}

export type ParseResult<T> = ParseSuccess<T> | ParseFailure<T>;

/**
 * Payload from either branch: the model's on success, the fallback otherwise
 */
export function payloadOf<T>(result: ParseResult<T>): T {
  return result.status === 'success' ? result.payload : result.fallback;
}

export interface PersonaDefinition<C, T> {
  feature: GatewayFeature;
  kind: 'text' | 'json';
  systemPrompt: string;
  userTemplate: string;
  temperature: number;
  /** Fill the templates from the typed context */
  render(context: C): { system: string; user: string };
  /** Validate model output; throws ParseError */
  parse(raw: string, maxTextLength: number): T;
  fallback(context: C): T;
}

export type PersonaRegistry = {
  [P in PersonaId]: PersonaDefinition<PersonaContexts[P], PersonaPayloads[P]>;
};

export interface GatewayHealth {
  provider: string;
  model: string;
  ok: true;
}
