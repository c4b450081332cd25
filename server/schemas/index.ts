/**
 * Zod schemas for route payloads, params and query strings.
 */

import { z } from "zod";

// ==================== COMMON ====================

export const IdParamSchema = z.object({
  id: z.coerce.number().int().positive(),
});

// ==================== CONVERSATIONS ====================

export const CreateConversationSchema = z.object({
  title: z.string().trim().min(1).max(200).optional(),
});

export type CreateConversation = z.infer<typeof CreateConversationSchema>;

export const PostTurnSchema = z.object({
  message: z.string().trim().min(1, "message cannot be empty").max(2000),
});

export type PostTurn = z.infer<typeof PostTurnSchema>;

// ==================== ADMIN ====================

export const TraceQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).default(50),
  userId: z.coerce.number().int().positive().optional(),
});

export type TraceQuery = z.infer<typeof TraceQuerySchema>;

export const ReplaceCategoriesSchema = z.object({
  categoryIds: z.array(z.number().int().positive()).max(10_000),
});

export type ReplaceCategories = z.infer<typeof ReplaceCategoriesSchema>;
