/**
 * Batch sentiment analysis through the interpreter provider.
 *
 * One call classifies a numbered batch of reviews. Items that come back
 * malformed are skipped; the caller treats a missing index as neutral.
 */

import { z } from 'zod';
import { SENTIMENT_LABELS, type SentimentLabel } from '@shared/schema';
import type { InterpreterClient } from './interpreter-client';

export const MAX_REVIEW_CHARS = 1200;
export const MAX_REASONS_PER_REVIEW = 3;

export interface SentimentItem {
  idx: number;
  sentiment: SentimentLabel;
  reasons: string[];
}

export interface SentimentAnalyzer {
  readonly model: string;
  analyzeBatch(texts: string[], signal?: AbortSignal): Promise<SentimentItem[]>;
}

const SYSTEM_INSTRUCTION = `You analyze customer reviews.
Return ONLY valid JSON of the form {"results": [...]}.
For each review, output an object:
{"idx": <int>, "sentiment": "positive|negative|neutral", "reasons": ["phrase", ...]}
Rules:
- reasons: up to 3 short noun phrases (2-5 words)
- no full sentences
- no punctuation`;

const itemSchema = z.object({
  idx: z.number().int(),
  sentiment: z.enum(SENTIMENT_LABELS),
  reasons: z.array(z.unknown()).optional(),
});

const envelopeSchema = z.union([
  z.object({ results: z.array(z.unknown()) }),
  z.array(z.unknown()),
]);

export function parseSentimentReply(raw: string): SentimentItem[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.trim());
  } catch {
    return [];
  }

  const envelope = envelopeSchema.safeParse(parsed);
  const items = envelope.success
    ? (Array.isArray(envelope.data) ? envelope.data : envelope.data.results)
    : [parsed];

  const out: SentimentItem[] = [];
  for (const item of items) {
    const result = itemSchema.safeParse(item);
    if (!result.success) continue;
    const reasons = (result.data.reasons ?? [])
      .flatMap((reason) => (typeof reason === 'string' && reason.trim() ? [reason.trim()] : []))
      .slice(0, MAX_REASONS_PER_REVIEW);
    out.push({ idx: result.data.idx, sentiment: result.data.sentiment, reasons });
  }
  return out;
}

export class LlmSentimentAnalyzer implements SentimentAnalyzer {
  constructor(private readonly client: InterpreterClient) {}

  get model(): string {
    return this.client.model;
  }

  async analyzeBatch(texts: string[], signal?: AbortSignal): Promise<SentimentItem[]> {
    const lines = texts
      .map((text, idx) => ({ idx, text: text.trim().slice(0, MAX_REVIEW_CHARS) }))
      .filter((entry) => entry.text.length > 0)
      .map((entry) => `[${entry.idx}] ${entry.text}`);

    if (lines.length === 0) {
      return [];
    }

    const raw = await this.client.complete({
      messages: [
        { role: 'system', content: SYSTEM_INSTRUCTION },
        {
          role: 'user',
          content: `Analyze the following reviews. Each result must include idx, sentiment, reasons.\n\n${lines.join('\n\n')}`,
        },
      ],
      json: true,
      temperature: 0.2,
      maxTokens: 600,
      signal,
    });

    return parseSentimentReply(raw);
  }
}
