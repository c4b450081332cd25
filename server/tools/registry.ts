/**
 * TOOL REGISTRY
 *
 * The closed set of deterministic analytics tools and their parameter
 * schemas. Built once at start-up from ToolLimits; the validator coerces
 * against these specs and the router sends `list()` to the interpreter.
 */

import type { ToolLimits } from '../config/tool-limits';
import {
  METRIC_NAMES,
  ORDER_DIRECTIONS,
  QUERY_TYPES,
  type ToolName,
  isToolName,
} from './types';

export type ParameterSpec =
  | { kind: 'integer'; min: number; max: number; default: number; description: string }
  | { kind: 'enum'; values: readonly string[]; default: string; description: string }
  | { kind: 'category'; required: boolean; description: string }
  | { kind: 'category_list'; description: string };

export interface ToolSchema {
  name: ToolName;
  description: string;
  parameters: Record<string, ParameterSpec>;
}

export interface ToolRegistry {
  lookup(toolName: string): ToolSchema | undefined;
  list(): ToolSchema[];
}

export function createToolRegistry(limits: ToolLimits): ToolRegistry {
  const schemas: ToolSchema[] = [
    {
      name: 'metrics_top_categories',
      description: 'Rank visible categories by review count, average rating or NPS.',
      parameters: {
        metric: { kind: 'enum', values: METRIC_NAMES, default: 'review_count', description: 'Ranking metric' },
        top_n: {
          kind: 'integer',
          min: limits.topNMin,
          max: limits.topNMax,
          default: limits.topNDefault,
          description: 'Number of categories to return',
        },
        order: { kind: 'enum', values: ORDER_DIRECTIONS, default: 'top', description: 'top = highest first, bottom = lowest first' },
        categories: { kind: 'category_list', description: 'Optional subset of categories to rank' },
      },
    },
    {
      name: 'rating_distribution',
      description: 'Count of reviews per star rating (1-5) for one category.',
      parameters: {
        category: { kind: 'category', required: true, description: 'Category name' },
      },
    },
    {
      name: 'sentiment_summary',
      description: 'Sentiment distribution and most frequent reasons for a sample of reviews in one category.',
      parameters: {
        category: { kind: 'category', required: true, description: 'Category name' },
        max_reviews: {
          kind: 'integer',
          min: limits.maxReviewsMin,
          max: limits.maxReviewsMax,
          default: limits.maxReviewsDefault,
          description: 'Number of reviews to analyze',
        },
      },
    },
    {
      name: 'compare_categories',
      description: 'Side-by-side review count, average rating and NPS for two categories.',
      parameters: {
        category_a: { kind: 'category', required: true, description: 'First category' },
        category_b: { kind: 'category', required: true, description: 'Second category' },
      },
    },
    {
      name: 'general_query',
      description: 'Overall statistics, category counts, the category list, or info on one category.',
      parameters: {
        query_type: { kind: 'enum', values: QUERY_TYPES, default: 'summary_stats', description: 'Kind of overview' },
        category: { kind: 'category', required: false, description: 'Category for category_info' },
      },
    },
  ];

  const byName = new Map<ToolName, ToolSchema>(schemas.map((schema) => [schema.name, schema]));

  return {
    lookup(toolName: string): ToolSchema | undefined {
      return isToolName(toolName) ? byName.get(toolName) : undefined;
    },
    list(): ToolSchema[] {
      return [...schemas];
    },
  };
}
