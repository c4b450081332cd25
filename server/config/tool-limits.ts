import type { Env } from './env';

/**
 * Numeric bounds for tool parameters. The tool registry is built from these
 * once at process start; nothing else hard-codes a bound.
 */
export interface ToolLimits {
  topNMin: number;
  topNMax: number;
  topNDefault: number;
  maxReviewsMin: number;
  maxReviewsMax: number;
  maxReviewsDefault: number;
}

export const DEFAULT_TOOL_LIMITS: ToolLimits = {
  topNMin: 1,
  topNMax: 50,
  topNDefault: 5,
  maxReviewsMin: 5,
  maxReviewsMax: 50,
  maxReviewsDefault: 30,
};

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function toolLimitsFromEnv(env: Pick<Env, 'TOOL_TOP_N_MAX' | 'TOOL_MAX_REVIEWS_MIN' | 'TOOL_MAX_REVIEWS_MAX'>): ToolLimits {
  const topNMax = env.TOOL_TOP_N_MAX;
  const maxReviewsMin = env.TOOL_MAX_REVIEWS_MIN;
  const maxReviewsMax = env.TOOL_MAX_REVIEWS_MAX;

  return {
    topNMin: DEFAULT_TOOL_LIMITS.topNMin,
    topNMax,
    // Defaults must stay inside overridden bounds
    topNDefault: clamp(DEFAULT_TOOL_LIMITS.topNDefault, DEFAULT_TOOL_LIMITS.topNMin, topNMax),
    maxReviewsMin,
    maxReviewsMax,
    maxReviewsDefault: clamp(DEFAULT_TOOL_LIMITS.maxReviewsDefault, maxReviewsMin, maxReviewsMax),
  };
}
