import type {
  User, InsertUser,
  Category,
  InsertReview,
  Conversation, InsertConversation,
  TurnTraceRow, InsertTurnTraceRow,
  ReviewSentimentCacheRow, InsertReviewSentimentCacheRow,
} from "@shared/schema";
import type { IStorage, RatingHistogramRow } from "./storage";
import { NotFoundError, ValidationError } from "./errors/app-errors";

interface StoredReview extends InsertReview {
  id: number;
}

/**
 * In-process IStorage used by tests and local experiments.
 * Mirrors DatabaseStorage semantics, including grant replacement bumping
 * accessVersion and append-only traces.
 */
export class MemStorage implements IStorage {
  private users = new Map<number, User>();
  private categories = new Map<number, Category>();
  private grants = new Map<number, Set<number>>();
  private conversations = new Map<number, Conversation>();
  private traces: TurnTraceRow[] = [];
  private reviews: StoredReview[] = [];
  private sentiment = new Map<string, ReviewSentimentCacheRow>();
  private ids = { user: 0, category: 0, conversation: 0, trace: 0, review: 0, sentiment: 0 };
  private clock: () => Date;

  constructor(clock: () => Date = () => new Date()) {
    this.clock = clock;
  }

  // Users
  async getUser(id: number): Promise<User | undefined> {
    return this.users.get(id);
  }

  async getUserByEmail(email: string): Promise<User | undefined> {
    return Array.from(this.users.values()).find((user) => user.email === email);
  }

  async createUser(user: InsertUser): Promise<User> {
    const now = this.clock();
    const created: User = {
      id: ++this.ids.user,
      email: user.email,
      role: user.role ?? "analyst",
      isActive: user.isActive ?? true,
      accessVersion: 0,
      createdAt: now,
      updatedAt: now,
    };
    this.users.set(created.id, created);
    return created;
  }

  /** Test helper: mimics deactivation or deletion done by account management */
  updateUser(id: number, patch: Partial<Pick<User, 'isActive' | 'role'>>): void {
    const user = this.users.get(id);
    if (user) {
      this.users.set(id, { ...user, ...patch });
    }
  }

  deleteUser(id: number): void {
    this.users.delete(id);
    this.grants.delete(id);
  }

  // Categories & grants
  async listCategories(): Promise<Category[]> {
    return Array.from(this.categories.values()).sort((a, b) => a.name.localeCompare(b.name));
  }

  async listCategoryNames(): Promise<string[]> {
    return (await this.listCategories()).map((category) => category.name);
  }

  async getGrantedCategoryNames(userId: number): Promise<string[]> {
    const granted = this.grants.get(userId) ?? new Set<number>();
    return Array.from(granted)
      .flatMap((id) => {
        const category = this.categories.get(id);
        return category ? [category.name] : [];
      })
      .sort((a, b) => a.localeCompare(b));
  }

  async replaceUserCategories(userId: number, categoryIds: number[]): Promise<User> {
    const user = this.users.get(userId);
    if (!user) {
      throw new NotFoundError('User not found', { userId });
    }
    const ids = Array.from(new Set(categoryIds));
    const unknown = ids.filter((id) => !this.categories.has(id));
    if (unknown.length > 0) {
      throw new ValidationError('Unknown category ids', { unknown });
    }

    this.grants.set(userId, new Set(ids));
    const updated: User = { ...user, accessVersion: user.accessVersion + 1, updatedAt: this.clock() };
    this.users.set(userId, updated);
    return updated;
  }

  async upsertCategories(names: string[]): Promise<Category[]> {
    const unique = Array.from(new Set(names));
    for (const name of unique) {
      const exists = Array.from(this.categories.values()).some((category) => category.name === name);
      if (!exists) {
        const category: Category = { id: ++this.ids.category, name, createdAt: this.clock() };
        this.categories.set(category.id, category);
      }
    }
    return (await this.listCategories()).filter((category) => unique.includes(category.name));
  }

  // Conversations
  async createConversation(conversation: InsertConversation): Promise<Conversation> {
    const now = this.clock();
    const created: Conversation = {
      id: ++this.ids.conversation,
      userId: conversation.userId,
      title: conversation.title ?? null,
      createdAt: now,
      updatedAt: now,
    };
    this.conversations.set(created.id, created);
    return created;
  }

  async getConversation(id: number): Promise<Conversation | undefined> {
    return this.conversations.get(id);
  }

  async getLatestConversation(userId: number): Promise<Conversation | undefined> {
    return Array.from(this.conversations.values())
      .filter((conversation) => conversation.userId === userId)
      .sort((a, b) => b.id - a.id)[0];
  }

  // Turn traces
  async appendTrace(trace: InsertTurnTraceRow): Promise<TurnTraceRow> {
    const row: TurnTraceRow = {
      id: ++this.ids.trace,
      conversationId: trace.conversationId,
      userId: trace.userId,
      accessVersion: trace.accessVersion,
      userQuery: trace.userQuery,
      routerDecision: trace.routerDecision ?? null,
      verdict: trace.verdict ?? null,
      finalCall: trace.finalCall ?? null,
      resultSummary: trace.resultSummary ?? null,
      fallbackRationale: trace.fallbackRationale ?? null,
      failure: trace.failure ?? null,
      reply: trace.reply ?? null,
      latencyMs: trace.latencyMs,
      createdAt: trace.createdAt ?? this.clock(),
    };
    this.traces.push(row);
    return row;
  }

  async listRecentTraces(limit: number, userId?: number): Promise<TurnTraceRow[]> {
    return this.traces
      .filter((trace) => userId === undefined || trace.userId === userId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
      .slice(0, limit);
  }

  async listConversationTraces(conversationId: number, limit: number): Promise<TurnTraceRow[]> {
    const rows = this.traces.filter((trace) => trace.conversationId === conversationId);
    return rows.slice(Math.max(0, rows.length - limit));
  }

  // Reviews
  async ratingHistogram(scope: string[]): Promise<RatingHistogramRow[]> {
    const allowed = new Set(scope);
    const counts = new Map<string, RatingHistogramRow>();
    for (const review of this.reviews) {
      if (!allowed.has(review.category)) continue;
      const key = `${review.category}\u0000${review.rating}`;
      const row = counts.get(key);
      if (row) {
        row.count += 1;
      } else {
        counts.set(key, { category: review.category, rating: review.rating, count: 1 });
      }
    }
    return Array.from(counts.values());
  }

  async sampleReviewTexts(category: string, scope: string[], limit: number): Promise<string[]> {
    if (!scope.includes(category)) {
      return [];
    }
    return this.reviews
      .filter((review) => review.category === category)
      .flatMap((review) => (typeof review.reviewText === 'string' ? [review.reviewText] : []))
      .slice(0, Math.max(0, limit));
  }

  async insertReviews(rows: InsertReview[]): Promise<number> {
    for (const row of rows) {
      this.reviews.push({ ...row, id: ++this.ids.review });
    }
    return rows.length;
  }

  // Sentiment cache
  async getSentimentCache(textHashes: string[]): Promise<ReviewSentimentCacheRow[]> {
    return textHashes.flatMap((hash) => {
      const row = this.sentiment.get(hash);
      return row ? [row] : [];
    });
  }

  async upsertSentimentCache(rows: InsertReviewSentimentCacheRow[]): Promise<void> {
    for (const row of rows) {
      const existing = this.sentiment.get(row.textHash);
      this.sentiment.set(row.textHash, {
        id: existing?.id ?? ++this.ids.sentiment,
        textHash: row.textHash,
        model: row.model,
        sentiment: row.sentiment,
        reasons: row.reasons ?? [],
        latencyMs: row.latencyMs ?? null,
        createdAt: existing?.createdAt ?? this.clock(),
      });
    }
  }
}
