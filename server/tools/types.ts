/**
 * Tool call and result types shared by the validator, fallback policy,
 * executor and trace recorder.
 *
 * A ToolCall is the only input the executor accepts. It is produced either by
 * the validator (from an interpreter proposal) or by the fallback policy.
 */

import { z } from 'zod';
import type { SentimentLabel } from '@shared/schema';

export const TOOL_NAMES = [
  'metrics_top_categories',
  'rating_distribution',
  'sentiment_summary',
  'compare_categories',
  'general_query',
] as const;
export type ToolName = typeof TOOL_NAMES[number];

export const METRIC_NAMES = ['review_count', 'avg_rating', 'nps'] as const;
export type MetricName = typeof METRIC_NAMES[number];

export const ORDER_DIRECTIONS = ['top', 'bottom'] as const;
export type OrderDirection = typeof ORDER_DIRECTIONS[number];

export const QUERY_TYPES = ['summary_stats', 'count_categories', 'list_categories', 'category_info'] as const;
export type QueryType = typeof QUERY_TYPES[number];

export function isToolName(value: string): value is ToolName {
  return TOOL_NAMES.some((name) => name === value);
}

// Shape checks only; numeric bounds live in the registry
export const toolInvocationSchema = z.discriminatedUnion('tool', [
  z.object({
    tool: z.literal('metrics_top_categories'),
    parameters: z.object({
      metric: z.enum(METRIC_NAMES),
      top_n: z.number().int(),
      order: z.enum(ORDER_DIRECTIONS),
      categories: z.array(z.string()).optional(),
    }),
  }),
  z.object({
    tool: z.literal('rating_distribution'),
    parameters: z.object({ category: z.string() }),
  }),
  z.object({
    tool: z.literal('sentiment_summary'),
    parameters: z.object({ category: z.string(), max_reviews: z.number().int() }),
  }),
  z.object({
    tool: z.literal('compare_categories'),
    parameters: z.object({ category_a: z.string(), category_b: z.string() }),
  }),
  z.object({
    tool: z.literal('general_query'),
    parameters: z.object({
      query_type: z.enum(QUERY_TYPES),
      category: z.string().optional(),
    }),
  }),
]);

export type ToolInvocation = z.infer<typeof toolInvocationSchema>;

export const REJECTION_REASONS = [
  'unsupported_tool',
  'interpreter_unavailable',
  'ambiguous_intent',
  'access_denied',
  'invalid_arguments',
] as const;
export type RejectionReason = typeof REJECTION_REASONS[number];

export type ToolCall = ToolInvocation & {
  isFallback: boolean;
  rejectionReason?: RejectionReason;
  fallbackRationale?: string;
};

export interface Coercion {
  parameter: string;
  from: unknown;
  to: unknown;
  reason: string;
}

// ============================================================================
// Results
// ============================================================================

export interface CategoryMetricsRow {
  category: string;
  review_count: number;
  avg_rating: number;
  nps: number;
}

export type RatingBucket = '1' | '2' | '3' | '4' | '5';

export interface RatingDistributionData {
  category: string;
  counts: Record<RatingBucket, number>;
  total: number;
}

export interface SentimentSummaryData {
  category: string;
  reviewCountAnalyzed: number;
  distribution: Record<SentimentLabel, number>;
  topReasons: Array<{ reason: string; count: number }>;
  cacheHits: number;
  newCacheRows: number;
}

export interface CompareCategoriesData {
  a: CategoryMetricsRow;
  b: CategoryMetricsRow;
}

export type GeneralQueryData =
  | { queryType: 'summary_stats'; categoryCount: number; reviewCount: number; avgRating: number; nps: number }
  | { queryType: 'count_categories'; categoryCount: number }
  | { queryType: 'list_categories'; categories: string[] }
  | { queryType: 'category_info'; metrics: CategoryMetricsRow };

export type ToolData =
  | { tool: 'metrics_top_categories'; metric: MetricName; order: OrderDirection; rows: CategoryMetricsRow[] }
  | { tool: 'rating_distribution'; distribution: RatingDistributionData }
  | { tool: 'sentiment_summary'; summary: SentimentSummaryData }
  | { tool: 'compare_categories'; comparison: CompareCategoriesData }
  | { tool: 'general_query'; result: GeneralQueryData };

export type ToolResult =
  | { status: 'ok'; tool: ToolName; data: ToolData }
  | { status: 'no_data'; tool: ToolName; categories: string[] }
  | { status: 'access_denied'; tool: ToolName };

/**
 * Categories a call references, in parameter order
 */
export function referencedCategories(call: ToolInvocation): string[] {
  switch (call.tool) {
    case 'metrics_top_categories':
      return call.parameters.categories ?? [];
    case 'rating_distribution':
    case 'sentiment_summary':
      return [call.parameters.category];
    case 'compare_categories':
      return [call.parameters.category_a, call.parameters.category_b];
    case 'general_query':
      return call.parameters.category === undefined ? [] : [call.parameters.category];
  }
}
