import { getDb } from "./db";
import { eq, desc, and, asc, inArray, isNotNull, sql } from "drizzle-orm";
import {
  users, type User, type InsertUser,
  categories, type Category,
  userCategoryAccess,
  reviews, type InsertReview,
  conversations, type Conversation, type InsertConversation,
  turnTraces, type TurnTraceRow, type InsertTurnTraceRow,
  reviewSentimentCache, type ReviewSentimentCacheRow, type InsertReviewSentimentCacheRow,
} from "@shared/schema";
import { NotFoundError, ValidationError } from "./errors/app-errors";

export interface RatingHistogramRow {
  category: string;
  rating: number;
  count: number;
}

const INSERT_CHUNK_SIZE = 1000;

// ============================================================================
// STORAGE INTERFACE - every read and write the analytics core performs
// ============================================================================
export interface IStorage {
  // Users
  getUser(id: number): Promise<User | undefined>;
  getUserByEmail(email: string): Promise<User | undefined>;
  createUser(user: InsertUser): Promise<User>;

  // Categories & grants
  listCategories(): Promise<Category[]>;
  listCategoryNames(): Promise<string[]>;
  getGrantedCategoryNames(userId: number): Promise<string[]>;
  /** Replaces the user's grants and increments accessVersion atomically */
  replaceUserCategories(userId: number, categoryIds: number[]): Promise<User>;
  upsertCategories(names: string[]): Promise<Category[]>;

  // Conversations
  createConversation(conversation: InsertConversation): Promise<Conversation>;
  getConversation(id: number): Promise<Conversation | undefined>;
  getLatestConversation(userId: number): Promise<Conversation | undefined>;

  // Turn traces (append-only)
  appendTrace(trace: InsertTurnTraceRow): Promise<TurnTraceRow>;
  listRecentTraces(limit: number, userId?: number): Promise<TurnTraceRow[]>;
  /** Most recent `limit` traces of a conversation, oldest first */
  listConversationTraces(conversationId: number, limit: number): Promise<TurnTraceRow[]>;

  // Reviews - every query is restricted to `scope`
  ratingHistogram(scope: string[]): Promise<RatingHistogramRow[]>;
  sampleReviewTexts(category: string, scope: string[], limit: number): Promise<string[]>;
  insertReviews(rows: InsertReview[]): Promise<number>;

  // Sentiment cache
  getSentimentCache(textHashes: string[]): Promise<ReviewSentimentCacheRow[]>;
  upsertSentimentCache(rows: InsertReviewSentimentCacheRow[]): Promise<void>;
}

export class DatabaseStorage implements IStorage {
  // ==========================================================================
  // USERS
  // ==========================================================================
  async getUser(id: number): Promise<User | undefined> {
    const [user] = await getDb().select().from(users).where(eq(users.id, id));
    return user;
  }

  async getUserByEmail(email: string): Promise<User | undefined> {
    const [user] = await getDb().select().from(users).where(eq(users.email, email));
    return user;
  }

  async createUser(user: InsertUser): Promise<User> {
    const [created] = await getDb().insert(users).values(user).returning();
    return created;
  }

  // ==========================================================================
  // CATEGORIES & GRANTS
  // ==========================================================================
  async listCategories(): Promise<Category[]> {
    return getDb().select().from(categories).orderBy(asc(categories.name));
  }

  async listCategoryNames(): Promise<string[]> {
    const rows = await getDb().select({ name: categories.name }).from(categories).orderBy(asc(categories.name));
    return rows.map((row) => row.name);
  }

  async getGrantedCategoryNames(userId: number): Promise<string[]> {
    const rows = await getDb()
      .select({ name: categories.name })
      .from(userCategoryAccess)
      .innerJoin(categories, eq(userCategoryAccess.categoryId, categories.id))
      .where(eq(userCategoryAccess.userId, userId))
      .orderBy(asc(categories.name));
    return rows.map((row) => row.name);
  }

  async replaceUserCategories(userId: number, categoryIds: number[]): Promise<User> {
    const ids = Array.from(new Set(categoryIds));

    return getDb().transaction(async (tx) => {
      const [user] = await tx.select().from(users).where(eq(users.id, userId)).for('update');
      if (!user) {
        throw new NotFoundError('User not found', { userId });
      }

      if (ids.length > 0) {
        const found = await tx.select({ id: categories.id }).from(categories).where(inArray(categories.id, ids));
        if (found.length !== ids.length) {
          const known = new Set(found.map((row) => row.id));
          throw new ValidationError('Unknown category ids', { unknown: ids.filter((id) => !known.has(id)) });
        }
      }

      await tx.delete(userCategoryAccess).where(eq(userCategoryAccess.userId, userId));
      if (ids.length > 0) {
        await tx.insert(userCategoryAccess).values(ids.map((categoryId) => ({ userId, categoryId })));
      }

      const [updated] = await tx
        .update(users)
        .set({ accessVersion: sql`${users.accessVersion} + 1`, updatedAt: new Date() })
        .where(eq(users.id, userId))
        .returning();
      return updated;
    });
  }

  async upsertCategories(names: string[]): Promise<Category[]> {
    const unique = Array.from(new Set(names));
    if (unique.length === 0) {
      return [];
    }

    const db = getDb();
    for (let start = 0; start < unique.length; start += INSERT_CHUNK_SIZE) {
      const chunk = unique.slice(start, start + INSERT_CHUNK_SIZE);
      await db.insert(categories).values(chunk.map((name) => ({ name }))).onConflictDoNothing({ target: categories.name });
    }
    return db.select().from(categories).where(inArray(categories.name, unique)).orderBy(asc(categories.name));
  }

  // ==========================================================================
  // CONVERSATIONS
  // ==========================================================================
  async createConversation(conversation: InsertConversation): Promise<Conversation> {
    const [created] = await getDb().insert(conversations).values(conversation).returning();
    return created;
  }

  async getConversation(id: number): Promise<Conversation | undefined> {
    const [conversation] = await getDb().select().from(conversations).where(eq(conversations.id, id));
    return conversation;
  }

  async getLatestConversation(userId: number): Promise<Conversation | undefined> {
    const [conversation] = await getDb()
      .select()
      .from(conversations)
      .where(eq(conversations.userId, userId))
      .orderBy(desc(conversations.createdAt), desc(conversations.id))
      .limit(1);
    return conversation;
  }

  // ==========================================================================
  // TURN TRACES
  // ==========================================================================
  async appendTrace(trace: InsertTurnTraceRow): Promise<TurnTraceRow> {
    const [created] = await getDb().insert(turnTraces).values(trace).returning();
    return created;
  }

  async listRecentTraces(limit: number, userId?: number): Promise<TurnTraceRow[]> {
    return getDb()
      .select()
      .from(turnTraces)
      .where(userId === undefined ? undefined : eq(turnTraces.userId, userId))
      .orderBy(desc(turnTraces.createdAt), desc(turnTraces.id))
      .limit(limit);
  }

  async listConversationTraces(conversationId: number, limit: number): Promise<TurnTraceRow[]> {
    const rows = await getDb()
      .select()
      .from(turnTraces)
      .where(eq(turnTraces.conversationId, conversationId))
      .orderBy(desc(turnTraces.id))
      .limit(limit);
    return rows.reverse();
  }

  // ==========================================================================
  // REVIEWS
  // ==========================================================================
  async ratingHistogram(scope: string[]): Promise<RatingHistogramRow[]> {
    if (scope.length === 0) {
      return [];
    }
    return getDb()
      .select({
        category: reviews.category,
        rating: reviews.rating,
        count: sql<number>`count(*)::int`,
      })
      .from(reviews)
      .where(inArray(reviews.category, scope))
      .groupBy(reviews.category, reviews.rating);
  }

  async sampleReviewTexts(category: string, scope: string[], limit: number): Promise<string[]> {
    if (scope.length === 0 || limit <= 0) {
      return [];
    }
    const rows = await getDb()
      .select({ text: reviews.reviewText })
      .from(reviews)
      .where(and(
        eq(reviews.category, category),
        inArray(reviews.category, scope),
        isNotNull(reviews.reviewText),
      ))
      .orderBy(asc(reviews.id))
      .limit(limit);
    return rows.flatMap((row) => (row.text === null ? [] : [row.text]));
  }

  async insertReviews(rows: InsertReview[]): Promise<number> {
    const db = getDb();
    let inserted = 0;
    for (let start = 0; start < rows.length; start += INSERT_CHUNK_SIZE) {
      const chunk = rows.slice(start, start + INSERT_CHUNK_SIZE);
      await db.insert(reviews).values(chunk);
      inserted += chunk.length;
    }
    return inserted;
  }

  // ==========================================================================
  // SENTIMENT CACHE
  // ==========================================================================
  async getSentimentCache(textHashes: string[]): Promise<ReviewSentimentCacheRow[]> {
    if (textHashes.length === 0) {
      return [];
    }
    return getDb().select().from(reviewSentimentCache).where(inArray(reviewSentimentCache.textHash, textHashes));
  }

  async upsertSentimentCache(rows: InsertReviewSentimentCacheRow[]): Promise<void> {
    const db = getDb();
    for (const row of rows) {
      await db
        .insert(reviewSentimentCache)
        .values(row)
        .onConflictDoUpdate({
          target: reviewSentimentCache.textHash,
          set: {
            model: row.model,
            sentiment: row.sentiment,
            reasons: row.reasons,
            latencyMs: row.latencyMs,
          },
        });
    }
  }
}

export const storage = new DatabaseStorage();
