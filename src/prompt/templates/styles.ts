import type { InsightLength, ToneStyle } from '../../personalization/types.js';

export const TONE_GUIDANCE: Record<ToneStyle, string> = {
  casual: 'Write in a friendly, conversational voice.',
  professional: 'Write in a clear, neutral voice.',
  concise: 'Be direct. No filler, no pleasantries.',
  detailed: 'Be thorough and cite the specific numbers behind each point.',
};

export const LENGTH_GUIDANCE: Record<InsightLength, string> = {
  short: 'Keep it under 50 words.',
  medium: 'Aim for 80 to 120 words.',
  long: 'Aim for 150 to 200 words.',
};
