/**
 * safe-router.ts — Async-safe Express router
 *
 * Express 4 does NOT catch rejected promises from async route handlers.
 * A bare `router.get("/x", async (req, res) => { throw … })` hangs the
 * request with no response.
 *
 * SafeRouter wraps every handler: rejections and sync throws are
 * forwarded to `next(err)`, which flows to the catch-all errorHandler
 * (envelope.ts).
 *
 * Usage:
 *   const router = createSafeRouter();
 *   router.get("/api/foo", async (req, res) => { … }); // always safe
 */

import { Router } from "express";
import type { Request, Response, NextFunction, RequestHandler } from "express";

// ─── Safe Router ────────────────────────────────────────────

type Handler = (req: Request, res: Response, next: NextFunction) => unknown;
type RoutePath = string | RegExp;

/** The subset of Router methods Chronicle registers routes through. */
export interface SafeRouter {
  readonly router: Router;
  get(path: RoutePath, ...handlers: Handler[]): SafeRouter;
  post(path: RoutePath, ...handlers: Handler[]): SafeRouter;
  put(path: RoutePath, ...handlers: Handler[]): SafeRouter;
  delete(path: RoutePath, ...handlers: Handler[]): SafeRouter;
}

/**
 * Create a router whose registration methods wrap every handler so that
 * a returned promise's rejection (or a sync throw) reaches `next(err)`.
 * Mount with `app.use(safe.router)`.
 */
export function createSafeRouter(): SafeRouter {
  const router = Router();

  const safe: SafeRouter = {
    router,
    get(path, ...handlers) {
      router.get(path, ...handlers.map(wrapHandler));
      return safe;
    },
    post(path, ...handlers) {
      router.post(path, ...handlers.map(wrapHandler));
      return safe;
    },
    put(path, ...handlers) {
      router.put(path, ...handlers.map(wrapHandler));
      return safe;
    },
    delete(path, ...handlers) {
      router.delete(path, ...handlers.map(wrapHandler));
      return safe;
    },
  };

  return safe;
}

// ─── Internal ───────────────────────────────────────────────

function isPromiseLike(value: unknown): value is Promise<unknown> {
  return typeof value === "object" && value !== null && "catch" in value && typeof value.catch === "function";
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

function wrapHandler(handler: Handler): RequestHandler {
  return function safeHandler(req: Request, res: Response, next: NextFunction): void {
    try {
      const result = handler(req, res, next);
      if (isPromiseLike(result)) {
        result.catch((e: unknown) => next(toError(e)));
      }
    } catch (syncErr) {
      next(toError(syncErr));
    }
  };
}
