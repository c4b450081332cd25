/**
 * TURN PIPELINE
 * =============
 *
 * One chat turn, end to end:
 *
 *   Route -> Validate -> (Fallback) -> Execute -> Reply -> Record
 *
 * - Turns of the same conversation run strictly one after another; different
 *   conversations run in parallel.
 * - An abort before execution cancels the turn and records nothing. Once
 *   execution starts the turn runs to completion.
 * - A DataSourceError at any stage aborts the turn: the failure and the stage
 *   it happened in are recorded verbatim and the caller receives an opaque
 *   TurnFailedError.
 */

import { z } from 'zod';
import type { TurnTraceRow } from '@shared/schema';
import { NO_ACCESS_VERSION, type AccessModel } from '../access/access-model';
import type { IStorage } from '../storage';
import type { RouterContext, RouterDecision, HistoryTurn } from '../router/types';
import type { Validator, ValidationVerdict } from '../validation/validator';
import type { FallbackPolicy } from '../policy/fallback-policy';
import type { ToolExecutor } from '../tools/executor';
import type { ResponseWriter } from '../llm/response-writer';
import type { TraceRecorder } from '../trace/trace-recorder';
import { toolInvocationSchema, type ToolCall, type ToolInvocation } from '../tools/types';
import {
  AppError,
  DataSourceError,
  getErrorMessage,
  NotFoundError,
  TurnCancelledError,
  TurnFailedError,
  UnauthorizedError,
} from '../errors/app-errors';
import { log as baseLog } from '../utils/logger';
import { summarizeResult, type TurnOutcome, type TurnRequest, type TurnStage } from './types';

const log = baseLog.child({ component: 'TurnPipeline' });

export interface Router {
  route(utterance: string, context: RouterContext): Promise<RouterDecision>;
}

export interface TurnPipelineDeps {
  storage: IStorage;
  accessModel: AccessModel;
  router: Router;
  validator: Validator;
  fallback: FallbackPolicy;
  executor: ToolExecutor;
  writer: ResponseWriter;
  recorder: TraceRecorder;
  historyWindow: number;
  now?: () => number;
}

/**
 * Serialises tasks sharing a key; tasks with different keys do not wait on
 * each other. A failed task does not block the ones queued behind it.
 */
export class KeyedSerialQueue<K> {
  private tails = new Map<K, Promise<void>>();

  run<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(() => undefined, () => undefined);
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return result;
  }

  get pending(): number {
    return this.tails.size;
  }
}

const finalCallToolSchema = z.object({ tool: z.string() });
const validatedVerdictSchema = z.object({ outcome: z.literal('validated') });

function toHistory(rows: TurnTraceRow[]): HistoryTurn[] {
  return rows.map((row) => {
    const call = finalCallToolSchema.safeParse(row.finalCall);
    return {
      utterance: row.userQuery,
      tool: call.success ? call.data.tool : null,
      reply: row.reply,
    };
  });
}

/**
 * The most recent call that passed validation without a fallback
 */
function findLastGoodCall(rows: TurnTraceRow[]): ToolInvocation | null {
  for (let index = rows.length - 1; index >= 0; index--) {
    const row = rows[index];
    if (!validatedVerdictSchema.safeParse(row.verdict).success || row.failure !== null) {
      continue;
    }
    const call = toolInvocationSchema.safeParse(row.finalCall);
    if (call.success) {
      return call.data;
    }
  }
  return null;
}

/** How far a turn got, for the failure trace */
interface TurnProgress {
  stage: TurnStage;
  started: number;
  accessVersion: number;
  decision: RouterDecision | null;
  verdict: ValidationVerdict | null;
  call: ToolCall | null;
}

async function readStore<T>(what: string, query: () => Promise<T>): Promise<T> {
  try {
    return await query();
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }
    throw new DataSourceError(`${what} failed: ${getErrorMessage(error)}`, { what });
  }
}

function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new TurnCancelledError('Turn cancelled', { stage });
  }
}

export class TurnPipeline {
  private readonly queue = new KeyedSerialQueue<number>();
  private readonly now: () => number;

  constructor(private readonly deps: TurnPipelineDeps) {
    this.now = deps.now ?? Date.now;
  }

  /** Conversations with a turn running or queued */
  get inFlight(): number {
    return this.queue.pending;
  }

  handleTurn(request: TurnRequest): Promise<TurnOutcome> {
    return this.queue.run(request.conversationId, () => this.runTurn(request));
  }

  private async runTurn(request: TurnRequest): Promise<TurnOutcome> {
    const progress: TurnProgress = {
      stage: 'load',
      started: this.now(),
      accessVersion: NO_ACCESS_VERSION,
      decision: null,
      verdict: null,
      call: null,
    };

    try {
      return await this.runStages(request, progress);
    } catch (error) {
      if (!(error instanceof DataSourceError)) {
        throw error;
      }
      log.error({
        conversationId: request.conversationId,
        userId: request.userId,
        stage: progress.stage,
        tool: progress.call?.tool,
        err: error,
      }, 'Turn aborted by data source failure');
      const traceId = await this.recordFailure(request, progress, error);
      throw new TurnFailedError(traceId);
    }
  }

  private async runStages(request: TurnRequest, progress: TurnProgress): Promise<TurnOutcome> {
    const { storage, accessModel, router, validator, fallback, executor, writer, recorder } = this.deps;
    const { conversationId, userId, utterance, signal } = request;

    throwIfAborted(signal, 'start');

    const user = await readStore('user lookup', () => storage.getUser(userId));
    if (!user || !user.isActive) {
      throw new UnauthorizedError('User is not active');
    }
    progress.accessVersion = user.accessVersion;
    const conversation = await readStore('conversation lookup', () => storage.getConversation(conversationId));
    if (!conversation || conversation.userId !== userId) {
      throw new NotFoundError('Conversation not found', { conversationId });
    }

    const scope = await accessModel.resolveScope(userId);
    progress.accessVersion = scope.accessVersion;
    const recent = await readStore('history lookup', () => recorder.listConversation(conversationId, this.deps.historyWindow));

    // Route
    const decision = await router.route(utterance, {
      conversationId,
      history: toHistory(recent),
      visibleCategories: Array.from(scope.categories).sort(),
      signal,
    });
    progress.decision = decision;
    throwIfAborted(signal, 'route');

    // Validate, then fall back on rejection
    progress.stage = 'validate';
    const verdict = await validator.validate(decision, userId);
    progress.verdict = verdict;
    let call: ToolCall;
    if (verdict.outcome === 'validated') {
      call = verdict.call;
    } else {
      progress.stage = 'fallback';
      call = await fallback.resolve(verdict, userId, findLastGoodCall(recent));
    }
    progress.call = call;
    throwIfAborted(signal, 'validate');

    log.debug({
      conversationId,
      decision: decision.kind,
      verdict: verdict.outcome,
      tool: call.tool,
      isFallback: call.isFallback,
    }, 'Executing turn');

    // Execute
    progress.stage = 'execute';
    const result = await executor.execute(call, userId);

    // Reply
    const reply = await writer.write({
      utterance,
      call,
      result,
      isFallback: call.isFallback,
      rejectionReason: call.rejectionReason,
      fallbackRationale: call.fallbackRationale,
    });

    // Record
    progress.stage = 'record';
    const trace = await readStore('trace insert', () => recorder.record({
      conversationId,
      userId,
      accessVersion: scope.accessVersion,
      userQuery: utterance,
      routerDecision: decision,
      verdict,
      finalCall: call,
      resultSummary: summarizeResult(result),
      fallbackRationale: call.fallbackRationale ?? null,
      failure: null,
      reply,
      latencyMs: this.now() - progress.started,
    }));

    log.info({
      traceId: trace.id,
      conversationId,
      tool: call.tool,
      status: result.status,
      isFallback: call.isFallback,
      latencyMs: trace.latencyMs,
    }, 'Turn completed');

    return {
      traceId: trace.id,
      reply,
      call,
      result,
      isFallback: call.isFallback,
      ...(call.rejectionReason && { rejectionReason: call.rejectionReason }),
    };
  }

  private async recordFailure(request: TurnRequest, progress: TurnProgress, error: DataSourceError): Promise<number | null> {
    try {
      const trace = await this.deps.recorder.record({
        conversationId: request.conversationId,
        userId: request.userId,
        accessVersion: progress.accessVersion,
        userQuery: request.utterance,
        routerDecision: progress.decision,
        verdict: progress.verdict,
        finalCall: progress.call,
        resultSummary: null,
        fallbackRationale: progress.call?.fallbackRationale ?? null,
        failure: { stage: progress.stage, code: error.code, message: error.message },
        reply: null,
        latencyMs: this.now() - progress.started,
      });
      return trace.id;
    } catch (recordError) {
      log.error({ conversationId: request.conversationId, err: recordError }, 'Failed to record failed turn');
      return null;
    }
  }
}
