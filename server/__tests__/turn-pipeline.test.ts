import { describe, it, expect, beforeEach } from '@jest/globals';
import { MemStorage } from '../storage.memory';
import type { RatingHistogramRow } from '../storage';
import { createServices, type Services } from '../container';
import { KeyedSerialQueue } from '../pipeline/turn-pipeline';
import { TemplateResponseWriter } from '../llm/response-writer';
import { TimeoutError, NotFoundError, TurnCancelledError, TurnFailedError, UnauthorizedError } from '../errors/app-errors';
import {
  buildWorld,
  instantRetryDeps,
  KeywordSentimentAnalyzer,
  proposal,
  ScriptedInterpreterClient,
  TEST_CONFIG,
  type ScriptedReply,
  type TestWorld,
} from './helpers/fixtures';

class FlakyStorage extends MemStorage {
  failHistogram = false;
  /** Grant reads that succeed before every further one fails; null never fails */
  grantReadsBeforeFailure: number | null = null;

  async getGrantedCategoryNames(userId: number): Promise<string[]> {
    if (this.grantReadsBeforeFailure !== null) {
      if (this.grantReadsBeforeFailure === 0) {
        throw new Error('connection reset by peer');
      }
      this.grantReadsBeforeFailure--;
    }
    return super.getGrantedCategoryNames(userId);
  }

  async ratingHistogram(scope: string[]): Promise<RatingHistogramRow[]> {
    if (this.failHistogram) {
      throw new Error('disk on fire');
    }
    return super.ratingHistogram(scope);
  }
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('TurnPipeline', () => {
  let storage: FlakyStorage;
  let world: TestWorld;
  let client: ScriptedInterpreterClient;
  let services: Services;

  function setup(script: ScriptedReply[]): void {
    client = new ScriptedInterpreterClient(script);
    services = createServices(TEST_CONFIG, storage, client, {
      sentimentAnalyzer: new KeywordSentimentAnalyzer(),
      writer: new TemplateResponseWriter(),
      retryDeps: instantRetryDeps,
    });
  }

  async function conversationFor(userId: number): Promise<number> {
    return (await storage.createConversation({ userId, title: null })).id;
  }

  beforeEach(async () => {
    storage = new FlakyStorage();
    world = await buildWorld(storage);
  });

  it('replaces a denied category with a ranking of the visible ones', async () => {
    setup([proposal('rating_distribution', { category: 'Home Audio' })]);
    const conversationId = await conversationFor(world.analyst.id);

    const outcome = await services.pipeline.handleTurn({
      conversationId,
      userId: world.analyst.id,
      utterance: 'Show the rating distribution for Home Audio',
    });

    expect(outcome.isFallback).toBe(true);
    expect(outcome.rejectionReason).toBe('access_denied');
    expect(outcome.call).toMatchObject({
      tool: 'metrics_top_categories',
      parameters: { categories: ['Electronics'], metric: 'review_count', top_n: 5, order: 'top' },
    });
    expect(outcome.reply).toBe(
      'That request includes a category outside your access, so here are the top categories you can see by review count.\n\n'
      + 'Top 1 categories by review count:\n'
      + '1. Electronics: 5 reviews, average rating 3.60, NPS 40.0'
    );

    const [trace] = await storage.listRecentTraces(10);
    expect(trace.id).toBe(outcome.traceId);
    expect(trace.verdict).toMatchObject({ outcome: 'rejected', reason: 'access_denied', offendingCategory: 'Home Audio' });
    expect(trace.routerDecision).toMatchObject({ kind: 'proposal', tool: 'rating_distribution' });
    expect(trace.accessVersion).toBe(1);
    expect(trace.failure).toBeNull();
  });

  it('shows the distribution when a category is compared with itself', async () => {
    setup([proposal('compare_categories', { category_a: 'Electronics', category_b: 'Electronics' })]);
    const conversationId = await conversationFor(world.analyst.id);

    const outcome = await services.pipeline.handleTurn({
      conversationId,
      userId: world.analyst.id,
      utterance: 'Compare Electronics and Electronics',
    });

    expect(outcome.call).toMatchObject({ tool: 'rating_distribution', parameters: { category: 'Electronics' }, isFallback: true });
    expect(outcome.rejectionReason).toBe('invalid_arguments');
    expect(outcome.result.status).toBe('ok');
  });

  it('runs an admin NPS ranking as proposed', async () => {
    setup([proposal('metrics_top_categories', { metric: 'nps', top_n: 10 })]);
    const conversationId = await conversationFor(world.admin.id);

    const outcome = await services.pipeline.handleTurn({
      conversationId,
      userId: world.admin.id,
      utterance: 'Show me the top 10 categories by NPS',
    });

    expect(outcome.isFallback).toBe(false);
    expect(outcome.call).toEqual({
      tool: 'metrics_top_categories',
      parameters: { metric: 'nps', top_n: 10, order: 'top' },
      isFallback: false,
    });
    const result = outcome.result;
    expect(result.status === 'ok' && result.data.tool === 'metrics_top_categories' && result.data.rows.map((row) => row.category))
      .toEqual(['Tablets', 'Electronics', 'Home Audio']);

    const [trace] = await storage.listRecentTraces(1);
    expect(trace.verdict).toMatchObject({ outcome: 'validated', coercions: [] });
  });

  it('clamps max_reviews and notes the coercion in the trace', async () => {
    setup([proposal('sentiment_summary', { category: 'Electronics', max_reviews: 500 })]);
    const conversationId = await conversationFor(world.analyst.id);

    const outcome = await services.pipeline.handleTurn({
      conversationId,
      userId: world.analyst.id,
      utterance: 'What do people complain about in Electronics? Use 500 reviews',
    });

    expect(outcome.isFallback).toBe(false);
    expect(outcome.call.parameters).toEqual({ category: 'Electronics', max_reviews: 50 });
    const [trace] = await storage.listRecentTraces(1);
    expect(trace.verdict).toMatchObject({
      outcome: 'validated',
      coercions: [{ parameter: 'max_reviews', from: 500, to: 50, reason: 'clamped to maximum 50' }],
    });
  });

  it('falls back to an overview when the interpreter keeps timing out', async () => {
    setup([new TimeoutError('Interpreter timed out', 15_000, 'interpreter.route')]);
    const conversationId = await conversationFor(world.analyst.id);

    const outcome = await services.pipeline.handleTurn({
      conversationId,
      userId: world.analyst.id,
      utterance: 'Top categories?',
    });

    expect(client.calls).toBe(3);
    expect(outcome.rejectionReason).toBe('interpreter_unavailable');
    expect(outcome.reply).toBe(
      'The question interpreter is temporarily unavailable, so here is a general overview of the data you can access.\n\n'
      + 'Across 1 categories there are 5 reviews, with an average rating of 3.60 and an NPS of 40.0.'
    );
    const [trace] = await storage.listRecentTraces(1);
    expect(trace.routerDecision).toEqual({ kind: 'unavailable', cause: 'timeout', attempts: 3, lastError: 'Interpreter timed out' });
  });

  it('repeats the last good call when new arguments are invalid', async () => {
    setup([
      proposal('rating_distribution', { category: 'Electronics' }),
      proposal('sentiment_summary', {}),
    ]);
    const conversationId = await conversationFor(world.analyst.id);

    await services.pipeline.handleTurn({ conversationId, userId: world.analyst.id, utterance: 'Ratings for Electronics' });
    const second = await services.pipeline.handleTurn({ conversationId, userId: world.analyst.id, utterance: 'And the reasons?' });

    expect(second.call).toEqual({
      tool: 'rating_distribution',
      parameters: { category: 'Electronics' },
      isFallback: true,
      rejectionReason: 'invalid_arguments',
      fallbackRationale: 'Some arguments in that request were invalid, so the previous analysis was repeated.',
    });

    const payload = JSON.parse(client.requests[1].messages[1].content);
    expect(payload.recent_turns).toEqual([
      {
        user: 'Ratings for Electronics',
        tool: 'rating_distribution',
        assistant: 'Rating distribution for Electronics (5 reviews): 1 star: 1, 2 stars: 0, 3 stars: 1, 4 stars: 1, 5 stars: 2.',
      },
    ]);
  });

  it('records a data source failure and surfaces an opaque error', async () => {
    setup([proposal('rating_distribution', { category: 'Electronics' })]);
    const conversationId = await conversationFor(world.analyst.id);
    storage.failHistogram = true;

    const error = await captureError(services.pipeline.handleTurn({
      conversationId,
      userId: world.analyst.id,
      utterance: 'Ratings for Electronics',
    }));

    expect(error).toBeInstanceOf(TurnFailedError);
    const [trace] = await storage.listRecentTraces(1);
    expect(error).toMatchObject({ traceId: trace.id, message: "We couldn't complete that request. Please try again later." });
    expect(trace.reply).toBeNull();
    expect(trace.resultSummary).toBeNull();
    expect(trace.failure).toEqual({
      stage: 'execute',
      code: 'DATA_SOURCE_ERROR',
      message: 'Query for rating_distribution failed: disk on fire',
    });
  });

  it('records a failed scope lookup and surfaces an opaque error', async () => {
    setup([proposal('rating_distribution', { category: 'Electronics' })]);
    const conversationId = await conversationFor(world.analyst.id);
    storage.grantReadsBeforeFailure = 0;

    const error = await captureError(services.pipeline.handleTurn({
      conversationId,
      userId: world.analyst.id,
      utterance: 'Ratings for Electronics',
    }));

    expect(error).toBeInstanceOf(TurnFailedError);
    expect(client.calls).toBe(0);
    const [trace] = await storage.listRecentTraces(1);
    expect(error).toMatchObject({ traceId: trace.id });
    expect(trace.accessVersion).toBe(1);
    expect(trace.routerDecision).toBeNull();
    expect(trace.verdict).toBeNull();
    expect(trace.finalCall).toBeNull();
    expect(trace.failure).toEqual({
      stage: 'load',
      code: 'DATA_SOURCE_ERROR',
      message: 'Access scope lookup failed: connection reset by peer',
    });
  });

  it('records the routing decision when validation loses the data source', async () => {
    setup([proposal('rating_distribution', { category: 'Electronics' })]);
    const conversationId = await conversationFor(world.analyst.id);
    storage.grantReadsBeforeFailure = 1;

    const error = await captureError(services.pipeline.handleTurn({
      conversationId,
      userId: world.analyst.id,
      utterance: 'Ratings for Electronics',
    }));

    expect(error).toBeInstanceOf(TurnFailedError);
    const [trace] = await storage.listRecentTraces(1);
    expect(trace.routerDecision).toMatchObject({ kind: 'proposal', tool: 'rating_distribution' });
    expect(trace.verdict).toBeNull();
    expect(trace.failure).toMatchObject({ stage: 'validate', code: 'DATA_SOURCE_ERROR' });
  });

  it('does not use a failed turn as the last good call', async () => {
    setup([
      proposal('rating_distribution', { category: 'Electronics' }),
      proposal('sentiment_summary', {}),
    ]);
    const conversationId = await conversationFor(world.analyst.id);

    storage.failHistogram = true;
    await captureError(services.pipeline.handleTurn({ conversationId, userId: world.analyst.id, utterance: 'Ratings' }));
    storage.failHistogram = false;

    const second = await services.pipeline.handleTurn({ conversationId, userId: world.analyst.id, utterance: 'Reasons?' });

    expect(second.call).toMatchObject({
      tool: 'metrics_top_categories',
      fallbackRationale: 'Some arguments in that request were invalid, so here are the top categories by review count.',
    });
  });

  describe('cancellation', () => {
    it('does nothing for a turn cancelled before it starts', async () => {
      setup([proposal('general_query', {})]);
      const conversationId = await conversationFor(world.analyst.id);
      const controller = new AbortController();
      controller.abort();

      const error = await captureError(services.pipeline.handleTurn({
        conversationId,
        userId: world.analyst.id,
        utterance: 'Overview',
        signal: controller.signal,
      }));

      expect(error).toBeInstanceOf(TurnCancelledError);
      expect(client.calls).toBe(0);
      expect(await storage.listRecentTraces(10)).toEqual([]);
    });

    it('records nothing when cancelled while routing', async () => {
      const controller = new AbortController();
      setup([async () => {
        controller.abort();
        return proposal('general_query', {});
      }]);
      const conversationId = await conversationFor(world.analyst.id);

      const error = await captureError(services.pipeline.handleTurn({
        conversationId,
        userId: world.analyst.id,
        utterance: 'Overview',
        signal: controller.signal,
      }));

      expect(error).toBeInstanceOf(TurnCancelledError);
      expect(await storage.listRecentTraces(10)).toEqual([]);
    });
  });

  describe('caller checks', () => {
    it('rejects deactivated users', async () => {
      setup([proposal('general_query', {})]);
      const conversationId = await conversationFor(world.analyst.id);
      storage.updateUser(world.analyst.id, { isActive: false });

      const error = await captureError(services.pipeline.handleTurn({
        conversationId,
        userId: world.analyst.id,
        utterance: 'Overview',
      }));

      expect(error).toBeInstanceOf(UnauthorizedError);
    });

    it("hides other users' conversations", async () => {
      setup([proposal('general_query', {})]);
      const conversationId = await conversationFor(world.admin.id);

      const error = await captureError(services.pipeline.handleTurn({
        conversationId,
        userId: world.analyst.id,
        utterance: 'Overview',
      }));

      expect(error).toBeInstanceOf(NotFoundError);
      expect(client.calls).toBe(0);
    });
  });

  describe('concurrency', () => {
    let release: () => void;
    let started: string[];

    beforeEach(async () => {
      started = [];
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      setup([async (request) => {
        const payload: { user_message: string } = JSON.parse(request.messages[1].content);
        started.push(payload.user_message);
        if (payload.user_message === 'slow') {
          await gate;
        }
        return proposal('general_query', { query_type: 'count_categories' });
      }]);
    });

    it('runs turns of one conversation one after another', async () => {
      const conversationId = await conversationFor(world.analyst.id);

      const first = services.pipeline.handleTurn({ conversationId, userId: world.analyst.id, utterance: 'slow' });
      const second = services.pipeline.handleTurn({ conversationId, userId: world.analyst.id, utterance: 'fast' });
      await flush();

      expect(started).toEqual(['slow']);
      expect(services.pipeline.inFlight).toBe(1);

      release();
      const outcomes = await Promise.all([first, second]);

      expect(started).toEqual(['slow', 'fast']);
      expect(outcomes[0].traceId).toBeLessThan(outcomes[1].traceId);
      await flush();
      expect(services.pipeline.inFlight).toBe(0);
    });

    it('runs different conversations in parallel', async () => {
      const slowConversation = await conversationFor(world.analyst.id);
      const otherConversation = await conversationFor(world.analystTwo.id);

      const slow = services.pipeline.handleTurn({ conversationId: slowConversation, userId: world.analyst.id, utterance: 'slow' });
      const fast = await services.pipeline.handleTurn({ conversationId: otherConversation, userId: world.analystTwo.id, utterance: 'fast' });

      expect(fast.result.status).toBe('ok');
      expect([...started].sort()).toEqual(['fast', 'slow']);

      release();
      await slow;
    });
  });
});

describe('KeyedSerialQueue', () => {
  it('keeps going after a failed task', async () => {
    const queue = new KeyedSerialQueue<string>();
    const order: string[] = [];

    const failing = queue.run('a', async () => {
      order.push('first');
      throw new Error('boom');
    });
    const next = queue.run('a', async () => {
      order.push('second');
      return 2;
    });

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe(2);
    expect(order).toEqual(['first', 'second']);
  });

  it('forgets idle keys', async () => {
    const queue = new KeyedSerialQueue<number>();
    await queue.run(1, async () => 'done');
    await flush();
    expect(queue.pending).toBe(0);
  });
});
