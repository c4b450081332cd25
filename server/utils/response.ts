/**
 * HTTP response envelopes
 *
 * Success: { ok: true, data: {...} }
 * Error:   { ok: false, error: "message" }
 */

import { type Response } from "express";

export interface ApiResponse<T = unknown> {
  ok: boolean;
  data?: T;
  error?: string;
  code?: string;
  metadata?: Record<string, unknown>;
}

export function sendSuccess<T>(res: Response, data: T, metadata?: Record<string, unknown>, statusCode: number = 200): void {
  const response: ApiResponse<T> = {
    ok: true,
    data,
    ...(metadata && { metadata }),
  };

  res.status(statusCode).json(response);
}

export function sendError(res: Response, statusCode: number, error: string, code?: string, metadata?: Record<string, unknown>): void {
  const response: ApiResponse = {
    ok: false,
    error,
    ...(code && { code }),
    ...(metadata && { metadata }),
  };

  res.status(statusCode).json(response);
}
