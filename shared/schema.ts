import { pgTable, text, integer, serial, timestamp, boolean, jsonb, varchar, index, unique, smallint, bigserial } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// ============================================================================
// USERS - Accounts are managed elsewhere; the analytics core only reads
// id, role, isActive and accessVersion.
// ============================================================================
export const USER_ROLES = ["admin", "analyst"] as const;
export type UserRole = typeof USER_ROLES[number];

export const users = pgTable("users", {
  id: serial("id").primaryKey(),
  email: varchar("email", { length: 255 }).notNull().unique(),
  role: varchar("role", { length: 32 }).$type<UserRole>().notNull().default("analyst"),
  isActive: boolean("is_active").notNull().default(true),

  // Bumped on every grant change; used as the cache generation for this user
  accessVersion: integer("access_version").notNull().default(0),

  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export const insertUserSchema = createInsertSchema(users, {
  email: (schema) => schema.email.email(),
  role: z.enum(USER_ROLES),
}).omit({ id: true, accessVersion: true, createdAt: true, updatedAt: true });
export type InsertUser = z.infer<typeof insertUserSchema>;
export type User = typeof users.$inferSelect;

// ============================================================================
// CATEGORIES - Catalog of review categories found in the corpus
// ============================================================================
export const categories = pgTable("categories", {
  id: serial("id").primaryKey(),
  name: varchar("name", { length: 512 }).notNull().unique(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});

export type Category = typeof categories.$inferSelect;

// ============================================================================
// USER_CATEGORY_ACCESS - Analyst grants (admins implicitly see everything)
// ============================================================================
export const userCategoryAccess = pgTable("user_category_access", {
  id: serial("id").primaryKey(),
  userId: integer("user_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  categoryId: integer("category_id").notNull().references(() => categories.id, { onDelete: "cascade" }),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  userCategoryUnique: unique("uq_user_category").on(table.userId, table.categoryId),
  userIdx: index("user_category_access_user_idx").on(table.userId),
  categoryIdx: index("user_category_access_category_idx").on(table.categoryId),
}));

export type UserCategoryAccess = typeof userCategoryAccess.$inferSelect;

// ============================================================================
// REVIEWS - One row per (review x category)
// ============================================================================
export const reviews = pgTable("reviews", {
  id: bigserial("id", { mode: "number" }).primaryKey(),
  productId: varchar("product_id", { length: 128 }).notNull(),
  productName: text("product_name"),
  category: varchar("category", { length: 512 }).notNull(),
  rating: smallint("rating").notNull(), // 1..5
  reviewDate: timestamp("review_date", { withTimezone: true }).notNull(),
  reviewText: text("review_text"),
  reviewTitle: text("review_title"),
}, (table) => ({
  categoryIdx: index("reviews_category_idx").on(table.category),
  categoryRatingIdx: index("reviews_category_rating_idx").on(table.category, table.rating),
}));

export const insertReviewSchema = createInsertSchema(reviews, {
  rating: z.number().int().min(1).max(5),
}).omit({ id: true });
export type InsertReview = z.infer<typeof insertReviewSchema>;
export type Review = typeof reviews.$inferSelect;

// ============================================================================
// CONVERSATIONS - Chat sessions; the id travels explicitly through every turn
// ============================================================================
export const conversations = pgTable("conversations", {
  id: serial("id").primaryKey(),
  userId: integer("user_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  title: text("title"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  userIdx: index("conversations_user_idx").on(table.userId),
}));

export const insertConversationSchema = createInsertSchema(conversations).omit({
  id: true,
  createdAt: true,
  updatedAt: true,
});
export type InsertConversation = z.infer<typeof insertConversationSchema>;
export type Conversation = typeof conversations.$inferSelect;

// ============================================================================
// TURN_TRACES - Append-only audit row per turn (admin-readable only)
// Payload columns hold the JSON shapes declared in server/pipeline/types.ts
// ============================================================================
export const turnTraces = pgTable("turn_traces", {
  id: bigserial("id", { mode: "number" }).primaryKey(),
  conversationId: integer("conversation_id").notNull().references(() => conversations.id, { onDelete: "cascade" }),
  userId: integer("user_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  accessVersion: integer("access_version").notNull(),

  userQuery: text("user_query").notNull(),
  // null when the turn failed before reaching that stage
  routerDecision: jsonb("router_decision"),
  verdict: jsonb("verdict"),
  finalCall: jsonb("final_call"),
  resultSummary: jsonb("result_summary"),
  fallbackRationale: text("fallback_rationale"),
  failure: jsonb("failure"),
  reply: text("reply"),

  latencyMs: integer("latency_ms").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  conversationIdx: index("turn_traces_conversation_idx").on(table.conversationId),
  userIdx: index("turn_traces_user_idx").on(table.userId),
  createdIdx: index("turn_traces_created_idx").on(table.createdAt),
}));

export type TurnTraceRow = typeof turnTraces.$inferSelect;
export type InsertTurnTraceRow = typeof turnTraces.$inferInsert;

// ============================================================================
// REVIEW_SENTIMENT_CACHE - Per-review sentiment keyed by normalized text hash
// ============================================================================
export const SENTIMENT_LABELS = ["positive", "negative", "neutral"] as const;
export type SentimentLabel = typeof SENTIMENT_LABELS[number];

export const reviewSentimentCache = pgTable("review_sentiment_cache", {
  id: bigserial("id", { mode: "number" }).primaryKey(),
  textHash: varchar("text_hash", { length: 64 }).notNull().unique(),
  model: varchar("model", { length: 128 }).notNull(),
  sentiment: varchar("sentiment", { length: 16 }).$type<SentimentLabel>().notNull(),
  reasons: jsonb("reasons").$type<string[]>().notNull().default([]),
  latencyMs: integer("latency_ms"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});

export type ReviewSentimentCacheRow = typeof reviewSentimentCache.$inferSelect;
export type InsertReviewSentimentCacheRow = typeof reviewSentimentCache.$inferInsert;
