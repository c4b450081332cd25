import express from "express";
import { getEnv } from "./config/env";
import { registerRoutes } from "./routes";
import { createServices, defaultInterpreter } from "./container";
import { storage } from "./storage";
import { closeDb } from "./db";
import { applySecurity } from "./middleware/security";
import { errorHandler, notFoundHandler } from "./middleware/error-handler";
import { withRequestId, log as logger } from "./utils/logger";

const env = getEnv();
const app = express();

// HTTP security (Helmet + CORS)
applySecurity(app, env.CORS_ORIGIN);

// Request id for log correlation
app.use(withRequestId);

app.use(express.json({ limit: "1mb" }));

app.use((req, res, next) => {
  const start = Date.now();
  res.on("finish", () => {
    if (req.path.startsWith("/api")) {
      logger.info({
        rid: req.requestId,
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - start,
      }, "Request completed");
    }
  });
  next();
});

const interpreter = defaultInterpreter(env);
if (!env.OPENAI_API_KEY) {
  logger.warn("[Startup] OPENAI_API_KEY not set; every turn will fall back to the general overview");
}

const services = createServices(env, storage, interpreter);
registerRoutes(app, services, env.SESSION_SECRET);

app.use(notFoundHandler);
app.use(errorHandler);

const httpServer = app.listen(env.PORT, "0.0.0.0", () => {
  logger.info({ port: env.PORT, model: interpreter.model }, "[Startup] Serving");
});

function shutdown(signal: string) {
  logger.info({ signal }, "[Shutdown] Closing server");
  httpServer.close(() => {
    closeDb()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, "[Shutdown] Failed to close database pool");
        process.exit(1);
      });
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
