/**
 * ADMIN ROUTES
 * Grant management, category catalog and the turn audit trail.
 * Mounted behind authenticate + requireAdmin.
 */

import type { Router, Request, Response } from "express";
import type { Services } from "../container";
import { asyncHandler } from "../middleware/error-handler";
import { requirePrincipal } from "../middleware/auth";
import { sendSuccess } from "../utils/response";
import { reqLog } from "../utils/logger";
import { IdParamSchema, ReplaceCategoriesSchema, TraceQuerySchema } from "../schemas";

export function registerAdminRoutes(app: Router, services: Services) {
  /**
   * GET /api/admin/traces?limit&userId
   * Newest first
   */
  app.get("/traces", asyncHandler(async (req: Request, res: Response) => {
    const viewer = requirePrincipal(req);
    const { limit, userId } = TraceQuerySchema.parse(req.query);
    const traces = await services.recorder.listRecent(viewer.id, limit, userId);
    sendSuccess(res, traces, { count: traces.length });
  }));

  /**
   * PUT /api/admin/users/:id/categories
   * Replaces the user's grants; accessVersion is incremented in the same
   * transaction, invalidating that user's cached results
   */
  app.put("/users/:id/categories", asyncHandler(async (req: Request, res: Response) => {
    const admin = requirePrincipal(req);
    const { id } = IdParamSchema.parse(req.params);
    const { categoryIds } = ReplaceCategoriesSchema.parse(req.body);

    const user = await services.storage.replaceUserCategories(id, categoryIds);
    const granted = await services.storage.getGrantedCategoryNames(id);

    reqLog(req).info({
      adminId: admin.id,
      userId: id,
      grantCount: granted.length,
      accessVersion: user.accessVersion,
    }, "User category grants replaced");

    sendSuccess(res, { userId: id, accessVersion: user.accessVersion, categories: granted });
  }));

  /**
   * GET /api/admin/categories
   */
  app.get("/categories", asyncHandler(async (_req: Request, res: Response) => {
    const categories = await services.storage.listCategories();
    sendSuccess(res, categories, { count: categories.length });
  }));
}
