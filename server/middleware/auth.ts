/**
 * Authentication Middleware - signed bearer tokens
 *
 * Token format: base64url(header).base64url(payload).base64url(HMAC-SHA256)
 * Payload carries `sub` (user id), `iat` and `exp` (seconds). Verified
 * against SESSION_SECRET; the user is then re-read from storage on every
 * request, so deactivation takes effect immediately.
 */

import { type Request, type Response, type NextFunction, type RequestHandler } from "express";
import crypto from "crypto";
import { z } from "zod";
import type { User } from "@shared/schema";
import type { IStorage } from "../storage";
import { ForbiddenError, UnauthorizedError } from "../errors/app-errors";
import { log } from "../utils/logger";

declare module "express-serve-static-core" {
  interface Request {
    principal?: User;
  }
}

const DEFAULT_TTL_SECONDS = 86400; // 24 hours

const payloadSchema = z.object({
  sub: z.number().int().positive(),
  iat: z.number().int(),
  exp: z.number().int(),
});

export type TokenClaims = z.infer<typeof payloadSchema>;

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

function sign(input: string, secret: string): string {
  return crypto.createHmac("sha256", secret).update(input).digest("base64url");
}

/**
 * Issue a signed token for a user
 */
export function generateToken(
  userId: number,
  secret: string,
  ttlSeconds: number = DEFAULT_TTL_SECONDS,
  issuedAt: number = nowSeconds()
): string {
  const header = Buffer.from(JSON.stringify({ alg: "HS256", typ: "JWT" })).toString("base64url");
  const payload = Buffer.from(
    JSON.stringify({ sub: userId, iat: issuedAt, exp: issuedAt + ttlSeconds })
  ).toString("base64url");

  return `${header}.${payload}.${sign(`${header}.${payload}`, secret)}`;
}

/**
 * Verify signature and expiry. Returns the claims, or null when invalid.
 */
export function verifyToken(token: string, secret: string, at: number = nowSeconds()): TokenClaims | null {
  const parts = token.split(".");
  if (parts.length !== 3) {
    return null;
  }
  const [header, payload, signature] = parts;

  const expected = Buffer.from(sign(`${header}.${payload}`, secret));
  const actual = Buffer.from(signature);
  // Timing-safe comparison
  if (expected.length !== actual.length || !crypto.timingSafeEqual(expected, actual)) {
    return null;
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(payload, "base64url").toString());
  } catch {
    return null;
  }

  const claims = payloadSchema.safeParse(decoded);
  if (!claims.success || claims.data.exp <= at) {
    return null;
  }
  return claims.data;
}

/**
 * Bearer authentication. Attaches the active user as req.principal.
 */
export function authenticate(storage: IStorage, secret: string): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      next(new UnauthorizedError("Missing or invalid authorization header"));
      return;
    }

    const claims = verifyToken(authHeader.substring(7), secret);
    if (!claims) {
      next(new UnauthorizedError("Invalid or expired token"));
      return;
    }

    storage.getUser(claims.sub)
      .then((user) => {
        if (!user || !user.isActive) {
          log.warn({ component: "Auth", rid: req.requestId, userId: claims.sub }, "Token for inactive or unknown user");
          next(new UnauthorizedError("User is not active"));
          return;
        }
        req.principal = user;
        next();
      })
      .catch(next);
  };
}

/**
 * Principal attached by authenticate(); throws if the route forgot it
 */
export function requirePrincipal(req: Request): User {
  if (!req.principal) {
    throw new UnauthorizedError("Authentication required to access this resource");
  }
  return req.principal;
}

export function requireAdmin(req: Request, _res: Response, next: NextFunction) {
  if (!req.principal) {
    next(new UnauthorizedError("Authentication required to access this resource"));
    return;
  }
  if (req.principal.role !== "admin") {
    next(new ForbiddenError("Administrator role required"));
    return;
  }
  next();
}
