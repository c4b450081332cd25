/**
 * TOOL EXECUTOR
 * =============
 *
 * Runs a validated or fallback ToolCall against the review store, restricted
 * to the caller's visible categories. Every data-source query receives the
 * scope explicitly; an empty scope issues no query at all.
 *
 * Results are cached per (userId, accessVersion, fingerprint). Failures of the
 * data layer surface as DataSourceError and are never cached.
 */

import type { AccessModel, AccessScope } from '../access/access-model';
import type { IStorage } from '../storage';
import { AppError, DataSourceError, getErrorMessage } from '../errors/app-errors';
import { log as baseLog } from '../utils/logger';
import { cacheKey, fingerprint, type ResultCache } from './access-cache';
import { categoryMetrics, rankCategories, ratingDistribution, totals } from './metrics';
import { referencedCategories, type ToolCall, type ToolInvocation, type ToolResult, type SentimentSummaryData } from './types';

const log = baseLog.child({ component: 'ToolExecutor' });

/** Rows fetched per requested review, leaving room for duplicates */
const SENTIMENT_SAMPLE_FACTOR = 3;

export interface SentimentSummarizer {
  summarize(category: string, texts: string[], maxReviews: number): Promise<SentimentSummaryData>;
}

export class ToolExecutor {
  constructor(
    private readonly storage: IStorage,
    private readonly accessModel: AccessModel,
    private readonly cache: ResultCache,
    private readonly sentiment: SentimentSummarizer
  ) {}

  async execute(call: ToolCall, userId: number): Promise<ToolResult> {
    const print = fingerprint(call);

    // A hit at the current version was authorized under the same grants
    const version = await this.accessModel.currentAccessVersion(userId);
    const cached = this.cache.get(cacheKey(userId, version, print));
    if (cached) {
      log.debug({ userId, tool: call.tool, accessVersion: version }, 'Result cache hit');
      return cached;
    }

    const scope = await this.accessModel.resolveScope(userId);

    const denied = referencedCategories(call).find((category) => !scope.categories.has(category));
    if (denied !== undefined) {
      log.warn({ userId, tool: call.tool }, 'Executor refused call outside visible scope');
      return { status: 'access_denied', tool: call.tool };
    }

    const key = cacheKey(userId, scope.accessVersion, print);
    const started = Date.now();
    let result: ToolResult;
    try {
      result = await this.run(call, scope);
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      log.error({ userId, tool: call.tool, err: error }, 'Data source query failed');
      throw new DataSourceError(`Query for ${call.tool} failed: ${getErrorMessage(error)}`, { tool: call.tool });
    }

    this.cache.set(key, result);
    log.debug({
      userId,
      tool: call.tool,
      status: result.status,
      accessVersion: scope.accessVersion,
      latencyMs: Date.now() - started,
    }, 'Tool executed');
    return result;
  }

  private async run(call: ToolInvocation, scope: AccessScope): Promise<ToolResult> {
    const visible = Array.from(scope.categories).sort();

    switch (call.tool) {
      case 'metrics_top_categories': {
        const requested = call.parameters.categories ?? visible;
        if (requested.length === 0) {
          return { status: 'no_data', tool: call.tool, categories: [] };
        }
        const rows = categoryMetrics(await this.storage.ratingHistogram(requested));
        if (rows.length === 0) {
          return { status: 'no_data', tool: call.tool, categories: [...requested].sort() };
        }
        const { metric, order, top_n } = call.parameters;
        return {
          status: 'ok',
          tool: call.tool,
          data: { tool: call.tool, metric, order, rows: rankCategories(rows, metric, order, top_n) },
        };
      }

      case 'rating_distribution': {
        const { category } = call.parameters;
        const distribution = ratingDistribution(await this.storage.ratingHistogram([category]), category);
        if (distribution.total === 0) {
          return { status: 'no_data', tool: call.tool, categories: [category] };
        }
        return { status: 'ok', tool: call.tool, data: { tool: call.tool, distribution } };
      }

      case 'sentiment_summary': {
        const { category, max_reviews } = call.parameters;
        const texts = await this.storage.sampleReviewTexts(category, visible, max_reviews * SENTIMENT_SAMPLE_FACTOR);
        const summary = texts.length === 0 ? null : await this.sentiment.summarize(category, texts, max_reviews);
        if (!summary || summary.reviewCountAnalyzed === 0) {
          return { status: 'no_data', tool: call.tool, categories: [category] };
        }
        return { status: 'ok', tool: call.tool, data: { tool: call.tool, summary } };
      }

      case 'compare_categories': {
        const { category_a, category_b } = call.parameters;
        const rows = categoryMetrics(await this.storage.ratingHistogram([category_a, category_b]));
        const a = rows.find((row) => row.category === category_a);
        const b = rows.find((row) => row.category === category_b);
        if (!a || !b) {
          const missing = [category_a, category_b].filter((name) => !rows.some((row) => row.category === name));
          return { status: 'no_data', tool: call.tool, categories: missing };
        }
        return { status: 'ok', tool: call.tool, data: { tool: call.tool, comparison: { a, b } } };
      }

      case 'general_query':
        return this.runGeneralQuery(call, visible);
    }
  }

  private async runGeneralQuery(
    call: Extract<ToolInvocation, { tool: 'general_query' }>,
    visible: string[]
  ): Promise<ToolResult> {
    if (visible.length === 0) {
      return { status: 'no_data', tool: call.tool, categories: [] };
    }

    switch (call.parameters.query_type) {
      case 'count_categories':
        return {
          status: 'ok',
          tool: call.tool,
          data: { tool: call.tool, result: { queryType: 'count_categories', categoryCount: visible.length } },
        };

      case 'list_categories':
        return {
          status: 'ok',
          tool: call.tool,
          data: { tool: call.tool, result: { queryType: 'list_categories', categories: visible } },
        };

      case 'category_info': {
        const category = call.parameters.category;
        if (category === undefined) {
          return { status: 'no_data', tool: call.tool, categories: [] };
        }
        const [metrics] = categoryMetrics(await this.storage.ratingHistogram([category]));
        if (!metrics) {
          return { status: 'no_data', tool: call.tool, categories: [category] };
        }
        return {
          status: 'ok',
          tool: call.tool,
          data: { tool: call.tool, result: { queryType: 'category_info', metrics } },
        };
      }

      case 'summary_stats': {
        const histogram = await this.storage.ratingHistogram(visible);
        const overall = totals(histogram);
        if (overall.reviewCount === 0) {
          return { status: 'no_data', tool: call.tool, categories: visible };
        }
        return {
          status: 'ok',
          tool: call.tool,
          data: {
            tool: call.tool,
            result: {
              queryType: 'summary_stats',
              categoryCount: categoryMetrics(histogram).length,
              ...overall,
            },
          },
        };
      }
    }
  }
}
