/**
 * Response synthesis.
 *
 * TemplateResponseWriter renders a deterministic reply from the tool result.
 * LlmResponseWriter asks the interpreter provider for a friendlier phrasing,
 * restricted to the result's numbers, and falls back to the template on any
 * failure or empty output.
 */

import type { InterpreterClient } from './interpreter-client';
import type {
  CategoryMetricsRow,
  GeneralQueryData,
  MetricName,
  RejectionReason,
  ToolCall,
  ToolData,
  ToolResult,
} from '../tools/types';
import { withTimeout } from '../utils/timeout';
import { getErrorMessage } from '../errors/app-errors';
import { log as baseLog } from '../utils/logger';

const log = baseLog.child({ component: 'ResponseWriter' });

export interface ResponseInput {
  utterance: string;
  call: ToolCall;
  result: ToolResult;
  isFallback: boolean;
  rejectionReason?: RejectionReason;
  fallbackRationale?: string;
}

export interface ResponseWriter {
  write(input: ResponseInput, signal?: AbortSignal): Promise<string>;
}

const METRIC_LABELS: Record<MetricName, string> = {
  review_count: 'review count',
  avg_rating: 'average rating',
  nps: 'NPS',
};

function describeRow(row: CategoryMetricsRow): string {
  return `${row.category}: ${row.review_count} reviews, average rating ${row.avg_rating.toFixed(2)}, NPS ${row.nps.toFixed(1)}`;
}

function describeGeneral(result: GeneralQueryData): string {
  switch (result.queryType) {
    case 'summary_stats':
      return `Across ${result.categoryCount} categories there are ${result.reviewCount} reviews, with an average rating of ${result.avgRating.toFixed(2)} and an NPS of ${result.nps.toFixed(1)}.`;
    case 'count_categories':
      return `You can access ${result.categoryCount} categories.`;
    case 'list_categories':
      return `Categories you can access: ${result.categories.join(', ')}.`;
    case 'category_info':
      return `${describeRow(result.metrics)}.`;
  }
}

function describeData(data: ToolData): string {
  switch (data.tool) {
    case 'metrics_top_categories': {
      const heading = `${data.order === 'top' ? 'Top' : 'Bottom'} ${data.rows.length} categories by ${METRIC_LABELS[data.metric]}:`;
      return [heading, ...data.rows.map((row, index) => `${index + 1}. ${describeRow(row)}`)].join('\n');
    }
    case 'rating_distribution': {
      const { category, counts, total } = data.distribution;
      return `Rating distribution for ${category} (${total} reviews): 1 star: ${counts['1']}, 2 stars: ${counts['2']}, 3 stars: ${counts['3']}, 4 stars: ${counts['4']}, 5 stars: ${counts['5']}.`;
    }
    case 'sentiment_summary': {
      const { category, reviewCountAnalyzed, distribution, topReasons } = data.summary;
      const lines = [
        `Sentiment for ${category} across ${reviewCountAnalyzed} reviews: ${distribution.positive} positive, ${distribution.negative} negative, ${distribution.neutral} neutral.`,
      ];
      if (topReasons.length > 0) {
        lines.push(`Most common themes: ${topReasons.map((entry) => `${entry.reason} (${entry.count})`).join(', ')}.`);
      }
      return lines.join('\n');
    }
    case 'compare_categories':
      return `${describeRow(data.comparison.a)}.\n${describeRow(data.comparison.b)}.`;
    case 'general_query':
      return describeGeneral(data.result);
  }
}

function describeResult(result: ToolResult): string {
  switch (result.status) {
    case 'access_denied':
      return "You don't have access to the data needed for that request.";
    case 'no_data':
      return result.categories.length > 0
        ? `No reviews were found for ${result.categories.join(', ')}.`
        : 'No reviews were found for that request.';
    case 'ok':
      return describeData(result.data);
  }
}

export function renderTemplate(input: ResponseInput): string {
  const body = describeResult(input.result);
  return input.isFallback && input.fallbackRationale ? `${input.fallbackRationale}\n\n${body}` : body;
}

export class TemplateResponseWriter implements ResponseWriter {
  async write(input: ResponseInput): Promise<string> {
    return renderTemplate(input);
  }
}

const WRITER_SYSTEM = `You are an analytics assistant for product reviews.

You MUST:
- Answer ONLY using the numbers in the provided tool result.
- Not invent facts or categories.
- Be concise, clear and professional.
- If "is_fallback" is true, start by briefly stating the fallback rationale in your own words.
- If the data shows no clear recurring issues, say that feedback is mostly positive instead of inventing problems.

Do NOT mention tools, routing or implementation details. Output plain text only.`;

export class LlmResponseWriter implements ResponseWriter {
  constructor(
    private readonly client: InterpreterClient,
    private readonly timeoutMs: number
  ) {}

  async write(input: ResponseInput, signal?: AbortSignal): Promise<string> {
    const payload = {
      user_message: input.utterance,
      tool: input.call.tool,
      tool_parameters: input.call.parameters,
      tool_result: input.result,
      is_fallback: input.isFallback,
      fallback_rationale: input.fallbackRationale ?? null,
    };

    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const text = await withTimeout(
        this.client.complete({
          messages: [
            { role: 'system', content: WRITER_SYSTEM },
            { role: 'user', content: JSON.stringify(payload) },
          ],
          json: false,
          temperature: 0.3,
          maxTokens: 400,
          signal: controller.signal,
        }),
        { timeoutMs: this.timeoutMs, operation: 'interpreter.writeResponse', abortController: controller }
      );
      const trimmed = text.trim();
      if (trimmed) {
        return trimmed;
      }
      log.warn({ tool: input.call.tool }, 'Empty reply from writer - using template');
    } catch (error) {
      log.warn({ tool: input.call.tool, error: getErrorMessage(error) }, 'Reply synthesis failed - using template');
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }

    return renderTemplate(input);
  }
}
