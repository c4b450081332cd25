import { describe, it, expect, beforeEach } from '@jest/globals';
import { AccessModel } from '../access/access-model';
import { createToolRegistry } from '../tools/registry';
import { DEFAULT_TOOL_LIMITS } from '../config/tool-limits';
import { Validator } from '../validation/validator';
import { FallbackPolicy, type Rejection } from '../policy/fallback-policy';
import type { RouterDecision } from '../router/types';
import type { ToolInvocation } from '../tools/types';
import { buildWorld, type TestWorld } from './helpers/fixtures';

describe('FallbackPolicy', () => {
  let world: TestWorld;
  let validator: Validator;
  let policy: FallbackPolicy;

  beforeEach(async () => {
    world = await buildWorld();
    const registry = createToolRegistry(DEFAULT_TOOL_LIMITS);
    const access = new AccessModel(world.storage);
    validator = new Validator(registry, access);
    policy = new FallbackPolicy(registry, access);
  });

  async function reject(decision: RouterDecision, userId: number): Promise<Rejection> {
    const verdict = await validator.validate(decision, userId);
    if (verdict.outcome !== 'rejected') {
      throw new Error(`expected a rejection, got ${verdict.outcome}`);
    }
    return verdict;
  }

  function propose(tool: string, parameters: Record<string, unknown>): RouterDecision {
    return { kind: 'proposal', tool, parameters, confidence: 0.9, rationale: 'test' };
  }

  it('ranks the visible categories when a denied category was requested', async () => {
    const rejection = await reject(propose('rating_distribution', { category: 'Home Audio' }), world.analyst.id);

    const call = await policy.resolve(rejection, world.analyst.id, null);

    expect(call).toEqual({
      tool: 'metrics_top_categories',
      parameters: { categories: ['Electronics'], metric: 'review_count', top_n: 5, order: 'top' },
      isFallback: true,
      rejectionReason: 'access_denied',
      fallbackRationale: 'That request includes a category outside your access, so here are the top categories you can see by review count.',
    });
    expect(call.fallbackRationale).not.toContain('Home Audio');
  });

  it('shows the rating distribution when a category is compared with itself', async () => {
    const rejection = await reject(
      propose('compare_categories', { category_a: 'Electronics', category_b: 'Electronics' }),
      world.analyst.id
    );

    const call = await policy.resolve(rejection, world.analyst.id, null);

    expect(call).toMatchObject({
      tool: 'rating_distribution',
      parameters: { category: 'Electronics' },
      isFallback: true,
      rejectionReason: 'invalid_arguments',
    });
  });

  it('gives a general overview when the interpreter is unavailable', async () => {
    const rejection = await reject({ kind: 'unavailable', cause: 'timeout', attempts: 3, lastError: 'x' }, world.analyst.id);

    const call = await policy.resolve(rejection, world.analyst.id, null);

    expect(call).toEqual({
      tool: 'general_query',
      parameters: { query_type: 'summary_stats' },
      isFallback: true,
      rejectionReason: 'interpreter_unavailable',
      fallbackRationale: 'The question interpreter is temporarily unavailable, so here is a general overview of the data you can access.',
    });
  });

  it('gives a general overview for unsupported tools', async () => {
    const rejection = await reject(propose('export_csv', {}), world.analyst.id);

    const call = await policy.resolve(rejection, world.analyst.id, null);

    expect(call).toMatchObject({
      tool: 'general_query',
      parameters: { query_type: 'summary_stats' },
      rejectionReason: 'unsupported_tool',
    });
  });

  it('ranks the top five by review count when intent is ambiguous', async () => {
    const rejection = await reject({ kind: 'ambiguous', confidence: 0.1 }, world.analyst.id);

    const call = await policy.resolve(rejection, world.analyst.id, null);

    expect(call).toEqual({
      tool: 'metrics_top_categories',
      parameters: { metric: 'review_count', top_n: 5, order: 'top' },
      isFallback: true,
      rejectionReason: 'ambiguous_intent',
      fallbackRationale: 'The request was ambiguous, so here are the top categories by review count.',
    });
  });

  it('ignores the last good call for ambiguous intent', async () => {
    const lastGood: ToolInvocation = { tool: 'rating_distribution', parameters: { category: 'Electronics' } };
    const rejection = await reject({ kind: 'ambiguous', confidence: 0.1 }, world.analyst.id);

    const call = await policy.resolve(rejection, world.analyst.id, lastGood);

    expect(call.tool).toBe('metrics_top_categories');
  });

  describe('other invalid arguments', () => {
    it('repeats the last good call when it is still authorized', async () => {
      const lastGood: ToolInvocation = { tool: 'rating_distribution', parameters: { category: 'Electronics' } };
      const rejection = await reject(propose('sentiment_summary', {}), world.analyst.id);

      const call = await policy.resolve(rejection, world.analyst.id, lastGood);

      expect(call).toEqual({
        tool: 'rating_distribution',
        parameters: { category: 'Electronics' },
        isFallback: true,
        rejectionReason: 'invalid_arguments',
        fallbackRationale: 'Some arguments in that request were invalid, so the previous analysis was repeated.',
      });
    });

    it('does not repeat a last good call whose category was revoked', async () => {
      const lastGood: ToolInvocation = { tool: 'rating_distribution', parameters: { category: 'Electronics' } };
      await world.storage.replaceUserCategories(world.analyst.id, [world.categoryIds['Tablets']]);
      const rejection = await reject(propose('sentiment_summary', {}), world.analyst.id);

      const call = await policy.resolve(rejection, world.analyst.id, lastGood);

      expect(call).toMatchObject({
        tool: 'metrics_top_categories',
        parameters: { metric: 'review_count', top_n: 5, order: 'top' },
        fallbackRationale: 'Some arguments in that request were invalid, so here are the top categories by review count.',
      });
    });

    it('ranks the top categories when there is no last good call', async () => {
      const rejection = await reject(propose('compare_categories', { category_a: 'Electronics' }), world.analyst.id);

      const call = await policy.resolve(rejection, world.analyst.id, null);

      expect(call).toMatchObject({ tool: 'metrics_top_categories', rejectionReason: 'invalid_arguments' });
    });
  });

  it('keeps fallback top_n inside a narrowed registry bound', async () => {
    const registry = createToolRegistry({ ...DEFAULT_TOOL_LIMITS, topNMax: 3, topNDefault: 3 });
    const narrowPolicy = new FallbackPolicy(registry, new AccessModel(world.storage));
    const rejection = await reject({ kind: 'ambiguous', confidence: 0 }, world.admin.id);

    const call = await narrowPolicy.resolve(rejection, world.admin.id, null);

    expect(call).toMatchObject({ parameters: { top_n: 3 } });
  });
});
