/**
 * Interpreter client - the only place that talks to the LLM provider.
 *
 * Provider errors are classified here so retry logic stays provider-neutral:
 * - InterpreterTransientError: 429, 5xx, connection failures, provider timeouts
 * - InterpreterRequestError: auth and bad-request failures (never retried)
 */

import OpenAI from 'openai';
import {
  InterpreterRequestError,
  InterpreterTransientError,
  TimeoutError,
  getErrorMessage,
} from '../errors/app-errors';

export interface InterpreterMessage {
  role: 'system' | 'user';
  content: string;
}

export interface InterpreterRequest {
  messages: InterpreterMessage[];
  /** JSON-only responses */
  json: boolean;
  temperature: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface InterpreterClient {
  readonly model: string;
  complete(request: InterpreterRequest): Promise<string>;
}

export function isTransientInterpreterError(error: unknown): boolean {
  return error instanceof InterpreterTransientError || error instanceof TimeoutError;
}

export function classifyProviderError(error: unknown): InterpreterTransientError | InterpreterRequestError {
  if (error instanceof OpenAI.APIConnectionError) {
    // Includes APIConnectionTimeoutError
    return new InterpreterTransientError(`Interpreter connection failed: ${error.message}`, { kind: 'connection' });
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    if (status === 429) {
      return new InterpreterTransientError('Interpreter rate limited', { kind: 'rate_limited', status });
    }
    if (status !== undefined && status >= 500) {
      return new InterpreterTransientError(`Interpreter server error ${status}`, { kind: 'server_error', status });
    }
    return new InterpreterRequestError(`Interpreter rejected the request (${status ?? 'no status'}): ${error.message}`, {
      kind: 'request_rejected',
      status,
    });
  }
  return new InterpreterRequestError(`Interpreter call failed: ${getErrorMessage(error)}`, { kind: 'request_rejected' });
}

export class OpenAIInterpreterClient implements InterpreterClient {
  private readonly openai: OpenAI;

  constructor(apiKey: string, readonly model: string) {
    // Retries and timeouts are owned by the retry coordinator
    this.openai = new OpenAI({ apiKey, maxRetries: 0 });
  }

  async complete(request: InterpreterRequest): Promise<string> {
    try {
      const completion = await this.openai.chat.completions.create(
        {
          model: this.model,
          messages: request.messages,
          temperature: request.temperature,
          ...(request.maxTokens !== undefined && { max_tokens: request.maxTokens }),
          ...(request.json && { response_format: { type: 'json_object' as const } }),
        },
        { signal: request.signal }
      );
      return completion.choices[0]?.message?.content ?? '';
    } catch (error) {
      throw classifyProviderError(error);
    }
  }
}

/**
 * Stand-in used when no API key is configured: every call fails as a
 * non-transient request error, which the router reports as `unavailable`.
 */
export class UnconfiguredInterpreterClient implements InterpreterClient {
  readonly model = 'unconfigured';

  async complete(): Promise<string> {
    throw new InterpreterRequestError('OPENAI_API_KEY is not configured', { kind: 'not_configured' });
  }
}
