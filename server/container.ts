/**
 * Wires the analytics core from validated configuration.
 * Tests build the same graph with MemStorage and fake interpreter clients.
 */

import type { Env } from './config/env';
import { toolLimitsFromEnv } from './config/tool-limits';
import type { IStorage } from './storage';
import { AccessModel } from './access/access-model';
import { createToolRegistry, type ToolRegistry } from './tools/registry';
import { BoundedResultCache } from './tools/access-cache';
import { ToolExecutor } from './tools/executor';
import { Validator } from './validation/validator';
import { FallbackPolicy } from './policy/fallback-policy';
import { IntentRouter } from './router/intent-router';
import { TraceRecorder } from './trace/trace-recorder';
import { TurnPipeline } from './pipeline/turn-pipeline';
import { SentimentService } from './services/sentiment-service';
import {
  OpenAIInterpreterClient,
  UnconfiguredInterpreterClient,
  type InterpreterClient,
} from './llm/interpreter-client';
import { LlmSentimentAnalyzer, type SentimentAnalyzer } from './llm/sentiment-analyzer';
import { LlmResponseWriter, TemplateResponseWriter, type ResponseWriter } from './llm/response-writer';
import type { RetryDeps, RetryPolicy } from './llm/retry-coordinator';

export type ServiceConfig = Pick<Env,
  | 'ROUTER_MAX_ATTEMPTS'
  | 'ROUTER_BASE_DELAY_MS'
  | 'ROUTER_MAX_DELAY_MS'
  | 'ROUTER_ATTEMPT_TIMEOUT_MS'
  | 'ROUTER_DEADLINE_MS'
  | 'ROUTER_HISTORY_WINDOW'
  | 'ROUTER_MIN_CONFIDENCE'
  | 'TOOL_TOP_N_MAX'
  | 'TOOL_MAX_REVIEWS_MIN'
  | 'TOOL_MAX_REVIEWS_MAX'
  | 'ACCESS_CACHE_MAX_ENTRIES'
  | 'TRACE_QUERY_MAX_LIMIT'
>;

export interface ServiceOverrides {
  sentimentAnalyzer?: SentimentAnalyzer;
  writer?: ResponseWriter;
  retryDeps?: Partial<RetryDeps>;
}

export interface Services {
  storage: IStorage;
  registry: ToolRegistry;
  accessModel: AccessModel;
  validator: Validator;
  fallback: FallbackPolicy;
  executor: ToolExecutor;
  router: IntentRouter;
  recorder: TraceRecorder;
  pipeline: TurnPipeline;
  cache: BoundedResultCache;
}

export function retryPolicyFromConfig(config: ServiceConfig): RetryPolicy {
  return {
    maxAttempts: config.ROUTER_MAX_ATTEMPTS,
    baseDelayMs: config.ROUTER_BASE_DELAY_MS,
    maxDelayMs: config.ROUTER_MAX_DELAY_MS,
    attemptTimeoutMs: config.ROUTER_ATTEMPT_TIMEOUT_MS,
    deadlineMs: config.ROUTER_DEADLINE_MS,
  };
}

export function defaultInterpreter(env: Pick<Env, 'OPENAI_API_KEY' | 'OPENAI_MODEL'>): InterpreterClient {
  return env.OPENAI_API_KEY
    ? new OpenAIInterpreterClient(env.OPENAI_API_KEY, env.OPENAI_MODEL)
    : new UnconfiguredInterpreterClient();
}

export function createServices(
  config: ServiceConfig,
  storage: IStorage,
  interpreter: InterpreterClient,
  overrides: ServiceOverrides = {}
): Services {
  const client = interpreter;
  const retry = retryPolicyFromConfig(config);

  const registry = createToolRegistry(toolLimitsFromEnv(config));
  const accessModel = new AccessModel(storage);
  const cache = new BoundedResultCache(config.ACCESS_CACHE_MAX_ENTRIES);

  const sentiment = new SentimentService(
    storage,
    overrides.sentimentAnalyzer ?? new LlmSentimentAnalyzer(client),
    { retry, deps: overrides.retryDeps }
  );

  const executor = new ToolExecutor(storage, accessModel, cache, sentiment);
  const validator = new Validator(registry, accessModel);
  const fallback = new FallbackPolicy(registry, accessModel);
  const router = new IntentRouter(client, registry, {
    retry,
    minConfidence: config.ROUTER_MIN_CONFIDENCE,
    historyWindow: config.ROUTER_HISTORY_WINDOW,
    deps: overrides.retryDeps,
  });
  const recorder = new TraceRecorder(storage, config.TRACE_QUERY_MAX_LIMIT);

  const writer = overrides.writer
    ?? (client instanceof UnconfiguredInterpreterClient
      ? new TemplateResponseWriter()
      : new LlmResponseWriter(client, config.ROUTER_ATTEMPT_TIMEOUT_MS));

  const pipeline = new TurnPipeline({
    storage,
    accessModel,
    router,
    validator,
    fallback,
    executor,
    writer,
    recorder,
    historyWindow: config.ROUTER_HISTORY_WINDOW,
  });

  return { storage, registry, accessModel, validator, fallback, executor, router, recorder, pipeline, cache };
}
