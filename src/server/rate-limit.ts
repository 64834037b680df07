/**
 * rate-limit.ts — Inbound rate limiting
 *
 * - chatRateLimiter:   20 req/min per IP on POST /api/chat (Gemini calls are metered)
 * - globalRateLimiter: 120 req/min per IP baseline on all /api/* routes
 *
 * This is our own limit on callers; the upstream 429 handling lives in the
 * conversation controller.
 */

import rateLimit from "express-rate-limit";
import { sendFail, ErrorCode } from "./envelope.js";
import { log } from "./logger.js";

const IS_TEST = process.env.NODE_ENV === "test" || process.env.VITEST === "true";

export const chatRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 20,
  standardHeaders: true,
  legacyHeaders: false,
  validate: { xForwardedForHeader: false },
  handler: (req, res) => {
    log.http.warn({ ip: req.ip, path: req.path, event: "rate_limit.hit", limiter: "chat" }, "rate limit exceeded");
    sendFail(res, ErrorCode.RATE_LIMITED, "Chat rate limit reached. Please wait before sending more messages.", 429);
  },
  skip: () => IS_TEST,
});

export const globalRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 120,
  standardHeaders: true,
  legacyHeaders: false,
  validate: { xForwardedForHeader: false },
  handler: (req, res) => {
    log.http.warn({ ip: req.ip, path: req.path, event: "rate_limit.hit", limiter: "global" }, "rate limit exceeded");
    sendFail(res, ErrorCode.RATE_LIMITED, "Too many requests. Please slow down.", 429);
  },
  skip: () => IS_TEST,
});
