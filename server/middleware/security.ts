import helmet from "helmet";
import cors from "cors";
import type { Express } from "express";

export function applySecurity(app: Express, corsOrigin?: string) {
  app.use(helmet({
    crossOriginResourcePolicy: { policy: "cross-origin" },
  }));

  app.use(cors({
    origin: corsOrigin ? corsOrigin.split(",") : "*",
    credentials: Boolean(corsOrigin),
    methods: ["GET", "POST", "PUT", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "X-Request-ID"],
    exposedHeaders: ["X-Request-ID"]
  }));
}
