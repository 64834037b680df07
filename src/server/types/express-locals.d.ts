/**
 * express-locals.d.ts — Typed res.locals for Chronicle routes.
 *
 * See: src/server/envelope.ts (envelopeMiddleware sets _requestId, _startTime)
 */

declare global {
  namespace Express {
    interface Locals {
      _requestId?: string;
      _startTime?: number;
    }
  }
}

export {};  // Ensure this is treated as a module
