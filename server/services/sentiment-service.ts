/**
 * SENTIMENT SERVICE
 *
 * Aggregated sentiment for a sample of review texts, backed by a persistent
 * per-review cache keyed on sha256(trim(lower(text))).
 *
 * 1. Deduplicate texts by hash and keep the first `maxReviews`
 * 2. Read cached rows
 * 3. Analyze the rest in batches of 10 with shared retry discipline
 * 4. Fail closed: reviews without an analysis count as neutral, no reasons
 * 5. Upsert every newly analyzed row
 */

import crypto from 'crypto';
import type { InsertReviewSentimentCacheRow, SentimentLabel } from '@shared/schema';
import type { IStorage } from '../storage';
import type { SentimentAnalyzer, SentimentItem } from '../llm/sentiment-analyzer';
import { MAX_REASONS_PER_REVIEW } from '../llm/sentiment-analyzer';
import { isTransientInterpreterError } from '../llm/interpreter-client';
import { retryWithBackoff, type RetryDeps, type RetryPolicy } from '../llm/retry-coordinator';
import type { SentimentSummarizer } from '../tools/executor';
import type { SentimentSummaryData } from '../tools/types';
import { getErrorMessage } from '../errors/app-errors';
import { log as baseLog } from '../utils/logger';

const log = baseLog.child({ component: 'SentimentService' });

export const SENTIMENT_BATCH_SIZE = 10;
export const TOP_REASONS = 10;

export function sentimentTextHash(text: string): string {
  return crypto.createHash('sha256').update(text.trim().toLowerCase()).digest('hex');
}

export interface SentimentServiceOptions {
  retry: RetryPolicy;
  batchSize?: number;
  deps?: Partial<RetryDeps>;
}

export class SentimentService implements SentimentSummarizer {
  constructor(
    private readonly storage: IStorage,
    private readonly analyzer: SentimentAnalyzer,
    private readonly options: SentimentServiceOptions
  ) {}

  async summarize(category: string, texts: string[], maxReviews: number): Promise<SentimentSummaryData> {
    const reviews: Array<{ text: string; hash: string }> = [];
    const seen = new Set<string>();
    for (const raw of texts) {
      const text = raw.trim();
      if (!text) continue;
      const hash = sentimentTextHash(text);
      if (seen.has(hash)) continue;
      seen.add(hash);
      reviews.push({ text, hash });
      if (reviews.length >= maxReviews) break;
    }

    const cachedRows = await this.storage.getSentimentCache(reviews.map((review) => review.hash));
    const cached = new Map(cachedRows.map((row) => [row.textHash, row]));

    const distribution: Record<SentimentLabel, number> = { positive: 0, negative: 0, neutral: 0 };
    const reasonCounts = new Map<string, number>();
    const tally = (sentiment: SentimentLabel, reasons: string[]) => {
      distribution[sentiment] += 1;
      for (const reason of reasons) {
        const key = reason.trim().toLowerCase();
        if (key) reasonCounts.set(key, (reasonCounts.get(key) ?? 0) + 1);
      }
    };

    const uncached: Array<{ text: string; hash: string }> = [];
    for (const review of reviews) {
      const row = cached.get(review.hash);
      if (row) {
        tally(row.sentiment, row.reasons);
      } else {
        uncached.push(review);
      }
    }

    const batchSize = this.options.batchSize ?? SENTIMENT_BATCH_SIZE;
    let newCacheRows = 0;

    for (let start = 0; start < uncached.length; start += batchSize) {
      const chunk = uncached.slice(start, start + batchSize);
      const started = Date.now();
      const outputs = await this.analyzeChunk(chunk.map((review) => review.text));
      const latencyMs = Date.now() - started;
      const byIdx = new Map(outputs.map((item) => [item.idx, item]));

      const rows: InsertReviewSentimentCacheRow[] = chunk.map((review, idx) => {
        const item = byIdx.get(idx);
        const sentiment: SentimentLabel = item ? item.sentiment : 'neutral';
        const reasons = item ? item.reasons.slice(0, MAX_REASONS_PER_REVIEW) : [];
        tally(sentiment, reasons);
        return { textHash: review.hash, model: this.analyzer.model, sentiment, reasons, latencyMs };
      });

      await this.storage.upsertSentimentCache(rows);
      newCacheRows += rows.length;
    }

    const topReasons = Array.from(reasonCounts.entries())
      .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
      .slice(0, TOP_REASONS)
      .map(([reason, count]) => ({ reason, count }));

    log.debug({
      category,
      analyzed: reviews.length,
      cacheHits: reviews.length - uncached.length,
      newCacheRows,
    }, 'Sentiment summary computed');

    return {
      category,
      reviewCountAnalyzed: reviews.length,
      distribution,
      topReasons,
      cacheHits: reviews.length - uncached.length,
      newCacheRows,
    };
  }

  private async analyzeChunk(texts: string[]): Promise<SentimentItem[]> {
    const outcome = await retryWithBackoff(
      (_attempt, signal) => this.analyzer.analyzeBatch(texts, signal),
      {
        policy: this.options.retry,
        operation: 'sentiment.analyzeBatch',
        isTransient: isTransientInterpreterError,
        deps: this.options.deps,
      }
    );
    if (outcome.ok) {
      return outcome.value;
    }
    log.warn({
      reason: outcome.reason,
      attempts: outcome.attempts,
      batch: texts.length,
      error: getErrorMessage(outcome.error),
    }, 'Sentiment batch failed - counting as neutral');
    return [];
  }
}
