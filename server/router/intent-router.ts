/**
 * INTENT ROUTER
 *
 * Asks the interpreter to map an utterance to one registry tool and turns
 * whatever comes back into a RouterDecision. Never throws: provider failures
 * after bounded retries become the `unavailable` sentinel, malformed output
 * becomes `unknown`.
 *
 * Flow:
 * 1. Build prompt (tool catalog, visible categories, recent turns)
 * 2. Call interpreter under retry coordinator (per-attempt timeout + deadline)
 * 3. Parse JSON with zod and classify
 */

import { z } from 'zod';
import {
  AppError,
  InterpreterTransientError,
  InterpreterRequestError,
  TimeoutError,
  getErrorMessage,
} from '../errors/app-errors';
import type { InterpreterClient } from '../llm/interpreter-client';
import { isTransientInterpreterError } from '../llm/interpreter-client';
import { retryWithBackoff, type RetryDeps, type RetryPolicy, type RetryStopReason } from '../llm/retry-coordinator';
import type { ToolRegistry } from '../tools/registry';
import { log as baseLog } from '../utils/logger';
import { buildRouterMessages } from './prompt';
import type { RouterContext, RouterDecision, UnavailableCause } from './types';

const log = baseLog.child({ component: 'IntentRouter' });

const interpreterReplySchema = z.object({
  tool: z.string().nullable().optional(),
  parameters: z.record(z.unknown()).optional(),
  args: z.record(z.unknown()).optional(),
  confidence: z.number().min(0).max(1),
  rationale: z.string().optional(),
  ambiguous: z.boolean().optional(),
});

export interface IntentRouterOptions {
  retry: RetryPolicy;
  minConfidence: number;
  historyWindow: number;
  maxOutputTokens?: number;
  deps?: Partial<RetryDeps>;
}

const UNAVAILABLE_KINDS: readonly UnavailableCause[] = [
  'timeout',
  'rate_limited',
  'server_error',
  'connection',
  'request_rejected',
  'not_configured',
];

function unavailableCause(reason: RetryStopReason, error: unknown): UnavailableCause {
  if (reason === 'deadline') return 'deadline_exceeded';
  if (reason === 'aborted') return 'aborted';
  if (error instanceof TimeoutError) return 'timeout';
  if (error instanceof AppError) {
    const kind = error.context?.kind;
    const match = UNAVAILABLE_KINDS.find((cause) => cause === kind);
    if (match) return match;
  }
  if (error instanceof InterpreterTransientError) return 'server_error';
  if (error instanceof InterpreterRequestError) return 'request_rejected';
  return 'request_rejected';
}

export class IntentRouter {
  constructor(
    private readonly client: InterpreterClient,
    private readonly registry: ToolRegistry,
    private readonly options: IntentRouterOptions
  ) {}

  async route(utterance: string, context: RouterContext): Promise<RouterDecision> {
    const messages = buildRouterMessages({
      utterance,
      history: this.options.historyWindow > 0 ? context.history.slice(-this.options.historyWindow) : [],
      catalog: this.registry.list(),
      categories: context.visibleCategories,
    });

    const outcome = await retryWithBackoff(
      (_attempt, signal) => this.client.complete({
        messages,
        json: true,
        temperature: 0,
        maxTokens: this.options.maxOutputTokens ?? 300,
        signal,
      }),
      {
        policy: this.options.retry,
        operation: 'interpreter.route',
        isTransient: isTransientInterpreterError,
        signal: context.signal,
        deps: this.options.deps,
      }
    );

    if (!outcome.ok) {
      const decision: RouterDecision = {
        kind: 'unavailable',
        cause: unavailableCause(outcome.reason, outcome.error),
        attempts: outcome.attempts,
        lastError: getErrorMessage(outcome.error),
      };
      log.warn({
        conversationId: context.conversationId,
        cause: decision.cause,
        attempts: decision.attempts,
      }, 'Interpreter unavailable');
      return decision;
    }

    const decision = this.parse(outcome.value);
    log.debug({
      conversationId: context.conversationId,
      kind: decision.kind,
      attempts: outcome.attempts,
    }, 'Routing decision');
    return decision;
  }

  /**
   * Classifies raw interpreter text. Exposed for tests.
   */
  parse(raw: string): RouterDecision {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw.trim());
    } catch {
      return { kind: 'unknown', confidence: 0, detail: 'Interpreter reply is not valid JSON' };
    }

    // A single-element array wrapping the object is tolerated
    if (Array.isArray(parsed)) {
      if (parsed.length !== 1) {
        return { kind: 'unknown', confidence: 0, detail: 'Interpreter reply is an array' };
      }
      parsed = parsed[0];
    }

    const result = interpreterReplySchema.safeParse(parsed);
    if (!result.success) {
      return {
        kind: 'unknown',
        confidence: 0,
        detail: `Interpreter reply has the wrong shape: ${result.error.issues.map((issue) => issue.path.join('.') || 'root').join(', ')}`,
      };
    }

    const reply = result.data;
    const tool = reply.tool ?? null;

    if (tool === null || reply.ambiguous === true || reply.confidence < this.options.minConfidence) {
      return {
        kind: 'ambiguous',
        confidence: reply.confidence,
        ...(tool !== null && { candidateTool: tool }),
      };
    }

    if (!this.registry.lookup(tool)) {
      return {
        kind: 'unknown',
        confidence: 0,
        requestedTool: tool,
        detail: `Interpreter proposed unsupported tool '${tool}'`,
      };
    }

    return {
      kind: 'proposal',
      tool,
      parameters: reply.parameters ?? reply.args ?? {},
      confidence: reply.confidence,
      rationale: reply.rationale ?? '',
    };
  }
}
