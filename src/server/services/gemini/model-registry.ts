/**
 * model-registry.ts — Gemini Model Registry
 *
 * Models offered in the model selector, ordered by cost tier
 * (cheapest → most expensive). A session is only ever created
 * for a model listed here.
 */

import { UnknownModelError } from "./errors.js";

// ─── Model Definition ─────────────────────────────────────────

export interface ModelDef {
  id: string;
  name: string;
  tier: "budget" | "balanced" | "premium";
  description: string;
  thinking: boolean;
  contextWindow: number;
  costRelative: number; // 1 = cheapest, 4 = most expensive
  speed: "fastest" | "fast" | "moderate";
}

// ─── Registry ─────────────────────────────────────────────────

export const MODEL_REGISTRY: readonly ModelDef[] = [
  {
    id: "gemini-2.0-flash",
    name: "Gemini 2.0 Flash",
    tier: "budget",
    description: "Fast, low cost, generous free-tier quota. Good default for long role-play sessions.",
    thinking: false,
    contextWindow: 1_048_576,
    costRelative: 1,
    speed: "fastest",
  },
  {
    id: "gemini-2.5-flash-lite",
    name: "Gemini 2.5 Flash-Lite",
    tier: "budget",
    description: "Ultra-fast and cheap. No native thinking.",
    thinking: false,
    contextWindow: 1_048_576,
    costRelative: 1,
    speed: "fastest",
  },
  {
    id: "gemini-2.5-flash",
    name: "Gemini 2.5 Flash",
    tier: "balanced",
    description: "Best price-performance. Thinking-capable with dynamic budget.",
    thinking: true,
    contextWindow: 1_048_576,
    costRelative: 2,
    speed: "fast",
  },
  {
    id: "gemini-2.5-pro",
    name: "Gemini 2.5 Pro",
    tier: "premium",
    description: "Deep reasoning and long context. Lowest rate limits — expect more 429s.",
    thinking: true,
    contextWindow: 1_048_576,
    costRelative: 4,
    speed: "moderate",
  },
];

export const MODEL_REGISTRY_MAP: ReadonlyMap<string, ModelDef> = new Map(MODEL_REGISTRY.map((m) => [m.id, m]));

export const DEFAULT_MODEL = "gemini-2.0-flash";

/** Get a model definition by ID, or null if unknown. */
export function getModelDef(modelId: string): ModelDef | null {
  return MODEL_REGISTRY_MAP.get(modelId) ?? null;
}

/** Validate a model ID. Returns the ID if valid, or the default if not. */
export function resolveModelId(modelId: string | undefined | null): string {
  if (modelId && MODEL_REGISTRY_MAP.has(modelId)) return modelId;
  return DEFAULT_MODEL;
}

/** Like resolveModelId, but unknown IDs are an error instead of a fallback. */
export function requireModelId(modelId: string): string {
  if (!MODEL_REGISTRY_MAP.has(modelId)) {
    throw new UnknownModelError(modelId, MODEL_REGISTRY.map((m) => m.id));
  }
  return modelId;
}
