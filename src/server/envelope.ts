/**
 * envelope.ts — API response envelope.
 *
 * Consistent response shape for all JSON consumers:
 *   Success: { ok: true, data: T, meta: { requestId, timestamp, durationMs } }
 *   Error:   { ok: false, error: { code, message, detail?, hints? }, meta: ... }
 *
 * The chat stream is SSE rather than JSON, but its request-level failures
 * (validation, 503) are still sent through sendFail before the stream opens.
 *
 * Usage in routes:
 *   import { sendOk, sendFail, ErrorCode } from "../envelope.js";
 *   sendOk(res, { turns });
 *   sendFail(res, ErrorCode.MISSING_PARAM, "Missing 'message'", 400);
 */

import { randomUUID } from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import { log } from "./logger.js";

// ─── Error Codes (stable, machine-readable) ─────────────────────

export const ErrorCode = {
  // 503 — subsystem not ready
  GEMINI_NOT_READY: "GEMINI_NOT_READY",
  // 403/429
  FORBIDDEN: "FORBIDDEN",
  RATE_LIMITED: "RATE_LIMITED",
  // 400 — client errors
  MISSING_PARAM: "MISSING_PARAM",
  INVALID_PARAM: "INVALID_PARAM",
  UNKNOWN_MODEL: "UNKNOWN_MODEL",
  NOT_FOUND: "NOT_FOUND",
  PAYLOAD_TOO_LARGE: "PAYLOAD_TOO_LARGE",
  // 500 — failures
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ─── Meta ───────────────────────────────────────────────────────

export interface ApiMeta {
  requestId: string;
  timestamp: string;
  durationMs: number;
}

// ─── Envelope types (exported for tests) ────────────────────────

export interface ApiSuccess<T = unknown> {
  ok: true;
  data: T;
  meta: ApiMeta;
}

export interface ApiErrorResponse {
  ok: false;
  error: {
    code: string;
    message: string;
    detail?: unknown;
    hints?: string[];
  };
  meta: ApiMeta;
}

export type ApiEnvelope<T = unknown> = ApiSuccess<T> | ApiErrorResponse;

// ─── Middleware: attach requestId + startTime ───────────────────

export function envelopeMiddleware(_req: Request, res: Response, next: NextFunction): void {
  const requestId = randomUUID();

  res.locals._requestId = requestId;
  res.locals._startTime = Date.now();
  res.setHeader("X-Request-Id", requestId);

  next();
}

// ─── Helpers ────────────────────────────────────────────────────

export function buildMeta(res: Response): ApiMeta {
  const requestId: unknown = res.locals._requestId;
  const startTime: unknown = res.locals._startTime;
  return {
    requestId: typeof requestId === "string" ? requestId : "unknown",
    timestamp: new Date().toISOString(),
    durationMs: typeof startTime === "number" ? Date.now() - startTime : 0,
  };
}

/** Send a success envelope. */
export function sendOk(res: Response, data: unknown, statusCode = 200): void {
  res.status(statusCode).json({ ok: true, data, meta: buildMeta(res) });
}

/** Options for extended error details passed to sendFail. */
export interface FailOptions {
  detail?: unknown;
  hints?: string[];
}

/** Send an error envelope. */
export function sendFail(
  res: Response,
  code: string,
  message: string,
  statusCode = 400,
  options?: FailOptions,
): void {
  const detail = options?.detail;
  const hints = options?.hints;
  res.status(statusCode).json({
    ok: false,
    error: {
      code,
      message,
      ...(detail !== undefined ? { detail } : {}),
      ...(hints?.length ? { hints } : {}),
    },
    meta: buildMeta(res),
  });
}

// ─── Catch-all error handler (mount AFTER routes) ───────────────

export function errorHandler(err: Error & { status?: number; statusCode?: number }, _req: Request, res: Response, _next: NextFunction): void {
  // Streaming responses may already be mid-flight
  if (res.headersSent) {
    return;
  }

  let statusCode = err.status || err.statusCode || 500;
  let code: ErrorCodeValue = ErrorCode.INTERNAL_ERROR;

  if (err.message && err.message.includes("entity too large")) {
    statusCode = 413;
    code = ErrorCode.PAYLOAD_TOO_LARGE;
  }

  // Log the real error, but never echo internals in a 5xx.
  const internalMessage = err.message || "Internal server error";
  log.http.error({ err: internalMessage, requestId: res.locals._requestId }, "unhandled error");
  const clientMessage = statusCode >= 500 ? "Internal server error" : internalMessage;
  sendFail(res, code, clientMessage, statusCode);
}
