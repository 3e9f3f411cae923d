import { z } from 'zod';
import { WEEKDAYS } from '../utils/dates.js';

export const LlmEnergyPredictionSchema = z.object({
  overall: z.number().min(1).max(10),
  peakHours: z.array(z.string()).default([]),
  lowHours: z.array(z.string()).default([]),
  suggestion: z.string().min(1),
});

export type LlmEnergyPrediction = z.infer<typeof LlmEnergyPredictionSchema>;

export const LlmPatternSchema = z.object({
  name: z.string().min(1),
  description: z.string().min(1),
  variables: z.array(z.string().min(1)).min(1).max(2),
  patternType: z.enum(['correlation', 'trend', 'weekday']).default('correlation'),
  weekday: z.enum(WEEKDAYS).optional(),
  strength: z.number().min(-1).max(1),
  confidence: z.number().min(0).max(1),
  actionable: z.boolean().default(false),
});

export type LlmPattern = z.infer<typeof LlmPatternSchema>;

/** A bare array, or the array wrapped as `{ "patterns": [...] }` */
export const LlmPatternListSchema = z.union([
  z.array(LlmPatternSchema),
  z.object({ patterns: z.array(LlmPatternSchema) }).transform(wrapped => wrapped.patterns),
]);
