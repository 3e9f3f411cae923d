export { LLMGateway } from './llm-gateway.js';
export type { LLMGatewayOptions } from './llm-gateway.js';
export { PERSONAS } from './personas.js';
export { extractJson, parseJsonPayload, parseTextPayload } from './parse-result.js';
export {
  DAILY_BRIEF_FALLBACK,
  ENERGY_PREDICTION_FALLBACK,
  WEEKLY_REVIEW_FALLBACK,
  energyFallback,
  patternFallback,
} from './fallbacks.js';
export { LlmEnergyPredictionSchema, LlmPatternListSchema, LlmPatternSchema } from './schemas.js';
export type { LlmEnergyPrediction, LlmPattern } from './schemas.js';
export { payloadOf } from './types.js';
export type {
  FailureReason,
  GatewayFeature,
  GatewayHealth,
  ParseFailure,
  ParseResult,
  ParseSuccess,
  PersonaContexts,
  PersonaDefinition,
  PersonaId,
  PersonaPayloads,
  PersonaRegistry,
} from './types.js';
