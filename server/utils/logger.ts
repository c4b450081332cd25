import pino from "pino";
import { randomUUID } from "crypto";
import type { Request, Response, NextFunction } from "express";

declare module "express-serve-static-core" {
  interface Request {
    requestId?: string;
  }
}

export const log = pino({
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === "test" ? "silent" : "info"),
  redact: {
    paths: ["req.headers.authorization", "*.apiKey", "*.token"],
    censor: "[REDACTED]",
  },
  transport: process.env.NODE_ENV === "development" ? {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "HH:MM:ss",
      ignore: "pid,hostname"
    }
  } : undefined
});

export function withRequestId(req: Request, res: Response, next: NextFunction) {
  const header = req.headers["x-request-id"];
  req.requestId = typeof header === "string" && header.length > 0 ? header : randomUUID();
  res.setHeader("X-Request-ID", req.requestId);
  next();
}

export function reqLog(req: Request) {
  return log.child({
    rid: req.requestId,
    path: req.path,
    method: req.method
  });
}

export default log;
