/**
 * Shared test world: a MemStorage seeded with four categories, three users
 * and a small review corpus, plus scripted interpreter and sentiment fakes.
 *
 * Ratings per category:
 *   Electronics  5 5 4 3 1   (5 reviews, avg 3.6, NPS 40)
 *   Tablets      5 5 5 5 2   (5 reviews, avg 4.4, NPS 60)
 *   Home Audio   4 4 2       (3 reviews, avg 3.33, NPS 33.3)
 *   Kindle Store -           (no reviews)
 */

import type { InsertReview, User } from '@shared/schema';
import { MemStorage } from '../../storage.memory';
import type { ServiceConfig } from '../../container';
import type { InterpreterClient, InterpreterRequest } from '../../llm/interpreter-client';
import type { SentimentAnalyzer, SentimentItem } from '../../llm/sentiment-analyzer';
import type { RetryDeps, RetryPolicy } from '../../llm/retry-coordinator';

export const TEST_CONFIG: ServiceConfig = {
  ROUTER_MAX_ATTEMPTS: 3,
  ROUTER_BASE_DELAY_MS: 800,
  ROUTER_MAX_DELAY_MS: 10_000,
  ROUTER_ATTEMPT_TIMEOUT_MS: 8_000,
  ROUTER_DEADLINE_MS: 30_000,
  ROUTER_HISTORY_WINDOW: 6,
  ROUTER_MIN_CONFIDENCE: 0.35,
  TOOL_TOP_N_MAX: 50,
  TOOL_MAX_REVIEWS_MIN: 5,
  TOOL_MAX_REVIEWS_MAX: 50,
  ACCESS_CACHE_MAX_ENTRIES: 100,
  TRACE_QUERY_MAX_LIMIT: 200,
};

export const TEST_RETRY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 800,
  maxDelayMs: 10_000,
  attemptTimeoutMs: 8_000,
  deadlineMs: 30_000,
};

/** No waiting, frozen clock, midpoint jitter */
export const instantRetryDeps: RetryDeps = {
  now: () => 0,
  sleep: async () => undefined,
  random: () => 0.5,
};

export const CATEGORY_NAMES = ['Electronics', 'Home Audio', 'Kindle Store', 'Tablets'] as const;

const RATINGS: Record<string, number[]> = {
  'Electronics': [5, 5, 4, 3, 1],
  'Tablets': [5, 5, 5, 5, 2],
  'Home Audio': [4, 4, 2],
};

const ELECTRONICS_TEXTS = ['Great sound', '  great SOUND ', 'Battery died fast', 'Okay for the price', null];

export interface TestWorld {
  storage: MemStorage;
  categoryIds: Record<string, number>;
  admin: User;
  /** Granted Electronics only */
  analyst: User;
  /** Granted Electronics and Tablets */
  analystTwo: User;
}

export async function buildWorld(storage: MemStorage = new MemStorage()): Promise<TestWorld> {
  const categories = await storage.upsertCategories([...CATEGORY_NAMES]);
  const categoryIds: Record<string, number> = {};
  for (const category of categories) {
    categoryIds[category.name] = category.id;
  }

  const reviews: InsertReview[] = [];
  for (const [category, ratings] of Object.entries(RATINGS)) {
    ratings.forEach((rating, index) => {
      reviews.push({
        productId: `${category.toLowerCase().replace(/\s+/g, '-')}-${index}`,
        productName: `${category} product ${index}`,
        category,
        rating,
        reviewDate: new Date('2024-01-15T00:00:00Z'),
        reviewText: category === 'Electronics' ? ELECTRONICS_TEXTS[index] : `${category} review ${index}`,
        reviewTitle: null,
      });
    });
  }
  await storage.insertReviews(reviews);

  const admin = await storage.createUser({ email: 'admin@example.com', role: 'admin' });
  const analystCreated = await storage.createUser({ email: 'analyst@example.com', role: 'analyst' });
  const analyst = await storage.replaceUserCategories(analystCreated.id, [categoryIds['Electronics']]);
  const analystTwoCreated = await storage.createUser({ email: 'analyst2@example.com', role: 'analyst' });
  const analystTwo = await storage.replaceUserCategories(analystTwoCreated.id, [
    categoryIds['Electronics'],
    categoryIds['Tablets'],
  ]);

  return { storage, categoryIds, admin, analyst, analystTwo };
}

export type ScriptedReply = string | Error | ((request: InterpreterRequest) => Promise<string>);

/**
 * Replies are consumed in order; the last one repeats once the script runs out.
 */
export class ScriptedInterpreterClient implements InterpreterClient {
  readonly model = 'scripted-model';
  readonly requests: InterpreterRequest[] = [];

  constructor(private readonly script: ScriptedReply[]) {}

  get calls(): number {
    return this.requests.length;
  }

  async complete(request: InterpreterRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.script.length > 1 ? this.script.shift() : this.script[0];
    if (reply === undefined) {
      throw new Error('ScriptedInterpreterClient has no replies');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return typeof reply === 'function' ? reply(request) : reply;
  }
}

export function proposal(tool: string | null, parameters: Record<string, unknown>, confidence = 0.9): string {
  return JSON.stringify({ tool, parameters, confidence, rationale: 'test' });
}

/**
 * Labels a text positive when it contains "great", negative when it contains
 * "died", neutral otherwise
 */
export class KeywordSentimentAnalyzer implements SentimentAnalyzer {
  readonly model = 'keyword-model';
  readonly batches: string[][] = [];

  async analyzeBatch(texts: string[]): Promise<SentimentItem[]> {
    this.batches.push(texts);
    return texts.map((text, idx): SentimentItem => {
      const lowered = text.toLowerCase();
      if (lowered.includes('great')) return { idx, sentiment: 'positive', reasons: ['great sound'] };
      if (lowered.includes('died')) return { idx, sentiment: 'negative', reasons: ['battery life', 'Great Sound'] };
      return { idx, sentiment: 'neutral', reasons: [] };
    });
  }
}
