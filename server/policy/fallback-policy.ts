/**
 * FALLBACK POLICY
 *
 * Deterministic substitute action for every rejection. Rules are evaluated in
 * order and the first match wins. Rationales are shown to the user, so they
 * never name the category that caused an access denial.
 */

import type { AccessModel } from '../access/access-model';
import type { ToolRegistry } from '../tools/registry';
import {
  referencedCategories,
  type RejectionReason,
  type ToolCall,
  type ToolInvocation,
} from '../tools/types';
import type { ValidationVerdict } from '../validation/validator';
import { log as baseLog } from '../utils/logger';

const log = baseLog.child({ component: 'FallbackPolicy' });

export type Rejection = Extract<ValidationVerdict, { outcome: 'rejected' }>;

const FALLBACK_TOP_N = 5;

export class FallbackPolicy {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly accessModel: AccessModel
  ) {}

  async resolve(rejection: Rejection, userId: number, lastGoodToolCall: ToolInvocation | null): Promise<ToolCall> {
    const call = await this.pick(rejection, userId, lastGoodToolCall);
    log.warn({
      userId,
      rejectionReason: rejection.reason,
      rejectedTool: rejection.tool,
      fallbackTool: call.tool,
    }, 'Fallback applied');
    return call;
  }

  private async pick(rejection: Rejection, userId: number, lastGoodToolCall: ToolInvocation | null): Promise<ToolCall> {
    const reason = rejection.reason;

    // 1. Nothing usable came back from the interpreter
    if (reason === 'unsupported_tool' || reason === 'interpreter_unavailable') {
      const rationale = reason === 'interpreter_unavailable'
        ? 'The question interpreter is temporarily unavailable, so here is a general overview of the data you can access.'
        : 'That request does not match any supported analysis, so here is a general overview of the data you can access.';
      return this.fallback({ tool: 'general_query', parameters: { query_type: 'summary_stats' } }, reason, rationale);
    }

    // 2. Access denied: rank what the user can see instead
    if (reason === 'access_denied') {
      const visible = Array.from(await this.accessModel.resolveVisibleCategories(userId)).sort();
      return this.fallback(
        {
          tool: 'metrics_top_categories',
          parameters: { categories: visible, metric: 'review_count', top_n: this.topN(), order: 'top' },
        },
        reason,
        'That request includes a category outside your access, so here are the top categories you can see by review count.'
      );
    }

    // 3. Comparing a category with itself
    const repeated = rejection.parameters?.category_a;
    if (reason === 'invalid_arguments'
      && rejection.tool === 'compare_categories'
      && rejection.invalidKind === 'identical_categories'
      && typeof repeated === 'string') {
      return this.fallback(
        { tool: 'rating_distribution', parameters: { category: repeated } },
        reason,
        'Both sides of the comparison are the same category, so here is its rating distribution instead.'
      );
    }

    // 4. Ambiguous intent
    if (reason === 'ambiguous_intent') {
      return this.overview(reason, 'The request was ambiguous, so here are the top categories by review count.');
    }

    // 5. Other invalid arguments: repeat the last good call if still authorized
    if (lastGoodToolCall) {
      const visible = await this.accessModel.resolveVisibleCategories(userId);
      const stillAuthorized = referencedCategories(lastGoodToolCall).every((category) => visible.has(category));
      if (stillAuthorized) {
        return this.fallback(
          lastGoodToolCall,
          reason,
          'Some arguments in that request were invalid, so the previous analysis was repeated.'
        );
      }
    }

    return this.overview(reason, 'Some arguments in that request were invalid, so here are the top categories by review count.');
  }

  private overview(reason: RejectionReason, rationale: string): ToolCall {
    return this.fallback(
      {
        tool: 'metrics_top_categories',
        parameters: { metric: 'review_count', top_n: this.topN(), order: 'top' },
      },
      reason,
      rationale
    );
  }

  private fallback(invocation: ToolInvocation, rejectionReason: RejectionReason, fallbackRationale: string): ToolCall {
    return { ...invocation, isFallback: true, rejectionReason, fallbackRationale };
  }

  private topN(): number {
    const spec = this.registry.lookup('metrics_top_categories')?.parameters.top_n;
    if (spec?.kind !== 'integer') {
      return FALLBACK_TOP_N;
    }
    return Math.min(spec.max, Math.max(spec.min, FALLBACK_TOP_N));
  }
}
