/**
 * CONVERSATION ROUTES
 * Chat turns and the caller's own conversation history
 */

import type { Router, Request, Response } from "express";
import { z } from "zod";
import type { Conversation, TurnTraceRow } from "@shared/schema";
import type { Services } from "../container";
import { asyncHandler } from "../middleware/error-handler";
import { requirePrincipal } from "../middleware/auth";
import { NotFoundError } from "../errors/app-errors";
import { sendSuccess } from "../utils/response";
import { reqLog } from "../utils/logger";
import { CreateConversationSchema, IdParamSchema, PostTurnSchema } from "../schemas";

const TURN_HISTORY_LIMIT = 100;

const finalCallSchema = z.object({ tool: z.string(), isFallback: z.boolean() });

/**
 * Owner-facing view of a turn; validator details and denied categories stay
 * in the admin trace
 */
function toTurnView(row: TurnTraceRow) {
  const call = finalCallSchema.safeParse(row.finalCall);
  return {
    id: row.id,
    message: row.userQuery,
    reply: row.reply,
    tool: call.success ? call.data.tool : null,
    isFallback: call.success ? call.data.isFallback : false,
    failed: row.failure !== null,
    createdAt: row.createdAt,
  };
}

async function loadOwnConversation(services: Services, id: number, userId: number): Promise<Conversation> {
  const conversation = await services.storage.getConversation(id);
  if (!conversation || conversation.userId !== userId) {
    throw new NotFoundError("Conversation not found", { conversationId: id });
  }
  return conversation;
}

export function registerConversationRoutes(app: Router, services: Services) {
  /**
   * POST /api/conversations
   * Starts a new conversation for the caller
   */
  app.post("/conversations", asyncHandler(async (req: Request, res: Response) => {
    const user = requirePrincipal(req);
    const body = CreateConversationSchema.parse(req.body ?? {});
    const conversation = await services.storage.createConversation({ userId: user.id, title: body.title ?? null });
    sendSuccess(res, conversation, undefined, 201);
  }));

  /**
   * GET /api/conversations/current
   * The caller's latest conversation, created on first use
   */
  app.get("/conversations/current", asyncHandler(async (req: Request, res: Response) => {
    const user = requirePrincipal(req);
    const existing = await services.storage.getLatestConversation(user.id);
    const conversation = existing ?? await services.storage.createConversation({ userId: user.id, title: null });
    sendSuccess(res, conversation);
  }));

  /**
   * GET /api/conversations/:id/turns
   */
  app.get("/conversations/:id/turns", asyncHandler(async (req: Request, res: Response) => {
    const user = requirePrincipal(req);
    const { id } = IdParamSchema.parse(req.params);
    await loadOwnConversation(services, id, user.id);

    const rows = await services.recorder.listConversation(id, TURN_HISTORY_LIMIT);
    sendSuccess(res, rows.map(toTurnView));
  }));

  /**
   * POST /api/conversations/:id/turns
   * Runs one chat turn; aborted if the client disconnects before execution
   */
  app.post("/conversations/:id/turns", asyncHandler(async (req: Request, res: Response) => {
    const user = requirePrincipal(req);
    const { id } = IdParamSchema.parse(req.params);
    const { message } = PostTurnSchema.parse(req.body);

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    const outcome = await services.pipeline.handleTurn({
      conversationId: id,
      userId: user.id,
      utterance: message,
      signal: controller.signal,
    });

    reqLog(req).debug({ traceId: outcome.traceId, tool: outcome.call.tool }, "Turn served");

    sendSuccess(res, {
      traceId: outcome.traceId,
      reply: outcome.reply,
      tool: outcome.call.tool,
      parameters: outcome.call.parameters,
      result: outcome.result,
      isFallback: outcome.isFallback,
      ...(outcome.call.fallbackRationale && { fallbackRationale: outcome.call.fallbackRationale }),
    });
  }));
}
