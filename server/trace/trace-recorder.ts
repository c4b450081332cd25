/**
 * TRACE RECORDER
 *
 * Append-only audit of every turn. One insert per turn, never updated.
 * Reading traces is an admin capability; analysts get ForbiddenError.
 */

import type { TurnTraceRow } from '@shared/schema';
import type { IStorage } from '../storage';
import { ForbiddenError } from '../errors/app-errors';
import { log as baseLog } from '../utils/logger';
import type { TraceEntry } from '../pipeline/types';

const log = baseLog.child({ component: 'TraceRecorder' });

export class TraceRecorder {
  constructor(
    private readonly storage: IStorage,
    private readonly maxQueryLimit: number
  ) {}

  async record(entry: TraceEntry): Promise<TurnTraceRow> {
    const row = await this.storage.appendTrace({
      conversationId: entry.conversationId,
      userId: entry.userId,
      accessVersion: entry.accessVersion,
      userQuery: entry.userQuery,
      routerDecision: entry.routerDecision,
      verdict: entry.verdict,
      finalCall: entry.finalCall,
      resultSummary: entry.resultSummary,
      fallbackRationale: entry.fallbackRationale,
      failure: entry.failure,
      reply: entry.reply,
      latencyMs: entry.latencyMs,
    });

    log.debug({
      traceId: row.id,
      conversationId: entry.conversationId,
      tool: entry.finalCall?.tool,
      isFallback: entry.finalCall?.isFallback ?? false,
      failed: entry.failure !== null,
    }, 'Turn recorded');
    return row;
  }

  /**
   * Newest first. `limit` is clamped to [1, maxQueryLimit].
   */
  async listRecent(viewerId: number, limit: number, userId?: number): Promise<TurnTraceRow[]> {
    const viewer = await this.storage.getUser(viewerId);
    if (!viewer || !viewer.isActive || viewer.role !== 'admin') {
      log.warn({ viewerId }, 'Trace query refused for non-admin');
      throw new ForbiddenError('Only administrators can read traces');
    }

    const bounded = Math.min(this.maxQueryLimit, Math.max(1, Math.floor(limit)));
    return this.storage.listRecentTraces(bounded, userId);
  }

  /**
   * A conversation's most recent turns, oldest first. Callers check ownership.
   */
  async listConversation(conversationId: number, limit: number): Promise<TurnTraceRow[]> {
    return this.storage.listConversationTraces(conversationId, Math.max(0, limit));
  }
}
