/**
 * config.ts — Unified Configuration Resolution
 *
 * Chronicle — conversational history guide
 *
 * Single source of truth for all configuration. Priority chain:
 *   1. Environment variable
 *   2. Schema default
 *
 * Rules:
 * - All configuration resolves through `resolveConfig()`
 * - No `process.env` reads outside this file (except logger.ts, which
 *   resolves level and transport before config loads)
 * - Invalid numeric settings fail fast with ConfigError naming the variable
 */

import { resolveModelId } from "./services/gemini/model-registry.js";
import { loadSystemInstruction } from "./services/gemini/system-prompt.js";
import type { ConversationConfig } from "./conversation/controller.js";

// ─── Configuration Interface ────────────────────────────────────

export interface AppConfig {
  // ── System ──────────────────────────────────────────────────
  /** Server port (default: 3000) */
  port: number;
  /** Node environment (production, development, test) */
  nodeEnv: string;
  isTest: boolean;
  isDev: boolean;

  // ── Gemini API ──────────────────────────────────────────────
  geminiApiKey: string;

  // ── Conversation ────────────────────────────────────────────
  /** Initial model; user-selectable at runtime via PUT /api/model */
  modelName: string;
  systemInstruction: string;
  /** Committed turns kept when recovering from a 429 (default: 6) */
  historyLimit: number;
  /** Attempts per message, including the first (default: 3) */
  maxAttempts: number;
  /** One backoff time unit; waits are 2^attempt units (default: 1000) */
  backoffUnitMs: number;
}

export class ConfigError extends Error {
  constructor(readonly variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
  }
}

// ─── Resolution Helpers ─────────────────────────────────────────

/** Parse an integer env var with a lower bound; blank means default. */
export function readInt(env: NodeJS.ProcessEnv, variable: string, fallback: number, min: number): number {
  const raw = (env[variable] ?? "").trim();
  if (raw === "") return fallback;
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigError(variable, `expected an integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min) {
    throw new ConfigError(variable, `must be >= ${min}, got ${value}`);
  }
  return value;
}

// ─── Main Resolution Function ───────────────────────────────────

/**
 * Resolve complete application configuration.
 *
 * @param env - Environment to read (defaults to process.env; tests pass their own)
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = env.NODE_ENV || "development";
  const isTest = nodeEnv === "test" || env.VITEST === "true";
  const isDev = nodeEnv !== "production" && !isTest;

  const portRaw = (env.CHRONICLE_PORT || env.PORT || "").trim();
  const port = portRaw ? readInt({ PORT: portRaw }, "PORT", 3000, 0) : 3000;

  return {
    port,
    nodeEnv,
    isTest,
    isDev,
    geminiApiKey: (env.GEMINI_API_KEY || "").trim(),
    modelName: resolveModelId(env.CHRONICLE_MODEL),
    systemInstruction: loadSystemInstruction(env.CHRONICLE_SYSTEM_PROMPT_FILE),
    historyLimit: readInt(env, "CHRONICLE_HISTORY_LIMIT", 6, 0),
    maxAttempts: readInt(env, "CHRONICLE_MAX_ATTEMPTS", 3, 1),
    backoffUnitMs: readInt(env, "CHRONICLE_BACKOFF_UNIT_MS", 1000, 0),
  };
}

/** Synchronous bootstrap config from process.env. */
export function bootstrapConfigSync(): AppConfig {
  return resolveConfig(process.env);
}

/** The slice of AppConfig each conversation controller runs on. */
export function toConversationConfig(config: AppConfig): ConversationConfig {
  return {
    modelName: config.modelName,
    systemInstruction: config.systemInstruction,
    historyLimit: config.historyLimit,
    maxAttempts: config.maxAttempts,
    backoffUnitMs: config.backoffUnitMs,
  };
}
