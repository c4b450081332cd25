import express, { type Express } from "express";
import type { Services } from "./container";
import { authenticate, requireAdmin } from "./middleware/auth";
import { sendSuccess } from "./utils/response";
import { registerConversationRoutes } from "./routes/conversations";
import { registerAdminRoutes } from "./routes/admin";

/**
 * Mounts the API under /api. Everything except /api/health requires a
 * bearer token; /api/admin additionally requires the admin role.
 */
export function registerRoutes(app: Express, services: Services, sessionSecret: string) {
  const api = express.Router();

  api.get("/health", (_req, res) => {
    sendSuccess(res, { status: "ok", inFlightConversations: services.pipeline.inFlight });
  });

  api.use(authenticate(services.storage, sessionSecret));

  registerConversationRoutes(api, services);

  const admin = express.Router();
  admin.use(requireAdmin);
  registerAdminRoutes(admin, services);
  api.use("/admin", admin);

  app.use("/api", api);
}
