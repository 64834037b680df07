/**
 * gemini/errors.ts — Upstream error taxonomy
 *
 * Every failure the conversation core can observe is one of these classes.
 * Each carries a stable `kind` that flows into notices, SSE events and logs.
 *
 *   AuthError            — missing/invalid credentials (also upstream 401/403)
 *   SessionInitError     — chat construction failed (no client, bad model)
 *   QuotaExhaustedError  — upstream rate limit (HTTP 429 / RESOURCE_EXHAUSTED)
 *   UpstreamApiError     — any other upstream API failure
 *   UnexpectedError      — everything else
 */

import { ApiError } from "@google/genai";

export type ErrorKind =
  | "auth"
  | "session_init"
  | "quota_exhausted"
  | "api_error"
  | "unexpected"
  | "invalid_request";

export abstract class ChronicleError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class AuthError extends ChronicleError {
  readonly kind = "auth" as const;
}

export class SessionInitError extends ChronicleError {
  readonly kind = "session_init" as const;
}

export class QuotaExhaustedError extends ChronicleError {
  readonly kind = "quota_exhausted" as const;
}

export class UpstreamApiError extends ChronicleError {
  readonly kind = "api_error" as const;

  constructor(message: string, readonly status: number | null, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class UnexpectedError extends ChronicleError {
  readonly kind = "unexpected" as const;
}

/** Thrown by model selection; never crosses the controller boundary. */
export class UnknownModelError extends Error {
  constructor(readonly modelId: string, readonly validModels: readonly string[]) {
    super(`Unknown model: ${modelId}. Valid: ${validModels.join(", ")}`);
    this.name = "UnknownModelError";
  }
}

const QUOTA_PATTERN = /RESOURCE_EXHAUSTED|quota/i;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Map a raw SDK/transport failure onto the taxonomy.
 * Errors that are already classified pass through untouched.
 */
export function classifyUpstreamError(err: unknown): ChronicleError {
  if (err instanceof ChronicleError) return err;

  if (err instanceof ApiError) {
    if (err.status === 429 || QUOTA_PATTERN.test(err.message)) {
      return new QuotaExhaustedError(err.message, { cause: err });
    }
    if (err.status === 401 || err.status === 403) {
      return new AuthError(err.message, { cause: err });
    }
    return new UpstreamApiError(err.message, err.status, { cause: err });
  }

  return new UnexpectedError(errorMessage(err), { cause: err });
}
