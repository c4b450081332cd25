import { describe, it, expect, beforeEach } from '@jest/globals';
import { MemStorage } from '../storage.memory';
import { TraceRecorder } from '../trace/trace-recorder';
import { ForbiddenError } from '../errors/app-errors';
import type { TraceEntry } from '../pipeline/types';
import { buildWorld, type TestWorld } from './helpers/fixtures';

function entry(conversationId: number, userId: number, userQuery: string): TraceEntry {
  return {
    conversationId,
    userId,
    accessVersion: 1,
    userQuery,
    routerDecision: { kind: 'ambiguous', confidence: 0.2 },
    verdict: { outcome: 'rejected', reason: 'ambiguous_intent', detail: 'Interpreter confidence below threshold', coercions: [] },
    finalCall: {
      tool: 'metrics_top_categories',
      parameters: { metric: 'review_count', top_n: 5, order: 'top' },
      isFallback: true,
      rejectionReason: 'ambiguous_intent',
      fallbackRationale: 'The request was ambiguous, so here are the top categories by review count.',
    },
    resultSummary: null,
    fallbackRationale: 'The request was ambiguous, so here are the top categories by review count.',
    failure: null,
    reply: 'reply',
    latencyMs: 12,
  };
}

describe('TraceRecorder', () => {
  let world: TestWorld;
  let recorder: TraceRecorder;
  let tick: number;

  beforeEach(async () => {
    tick = 0;
    const storage = new MemStorage(() => new Date(Date.UTC(2024, 0, 1) + (tick++) * 1000));
    world = await buildWorld(storage);
    recorder = new TraceRecorder(storage, 200);
  });

  async function recordTurns() {
    const mine = await world.storage.createConversation({ userId: world.analyst.id, title: null });
    const theirs = await world.storage.createConversation({ userId: world.analystTwo.id, title: null });
    await recorder.record(entry(mine.id, world.analyst.id, 'first'));
    await recorder.record(entry(theirs.id, world.analystTwo.id, 'second'));
    await recorder.record(entry(mine.id, world.analyst.id, 'third'));
    return { mine, theirs };
  }

  it('lists traces newest first for administrators', async () => {
    await recordTurns();

    const traces = await recorder.listRecent(world.admin.id, 10);

    expect(traces.map((trace) => trace.userQuery)).toEqual(['third', 'second', 'first']);
    expect(traces[0].finalCall).toMatchObject({ tool: 'metrics_top_categories', isFallback: true });
  });

  it('filters by user', async () => {
    await recordTurns();

    const traces = await recorder.listRecent(world.admin.id, 10, world.analyst.id);

    expect(traces.map((trace) => trace.userQuery)).toEqual(['third', 'first']);
  });

  it('clamps the limit', async () => {
    await recordTurns();

    expect(await recorder.listRecent(world.admin.id, 0)).toHaveLength(1);
    expect(await recorder.listRecent(world.admin.id, 2.7)).toHaveLength(2);
    expect(await recorder.listRecent(world.admin.id, 10_000)).toHaveLength(3);
  });

  it('refuses analysts and inactive administrators', async () => {
    await expect(recorder.listRecent(world.analyst.id, 10)).rejects.toBeInstanceOf(ForbiddenError);

    world.storage.updateUser(world.admin.id, { isActive: false });
    await expect(recorder.listRecent(world.admin.id, 10)).rejects.toBeInstanceOf(ForbiddenError);
  });

  it("returns a conversation's latest turns oldest first", async () => {
    const { mine } = await recordTurns();

    expect((await recorder.listConversation(mine.id, 6)).map((trace) => trace.userQuery)).toEqual(['first', 'third']);
    expect((await recorder.listConversation(mine.id, 1)).map((trace) => trace.userQuery)).toEqual(['third']);
    expect(await recorder.listConversation(mine.id, 0)).toEqual([]);
  });
});
