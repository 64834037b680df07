/**
 * gemini/index.ts — Gemini service barrel
 */

export { authenticate, createGeminiClient } from "./client.js";
export type { GeminiClient, UpstreamChat } from "./client.js";
export {
  MODEL_REGISTRY,
  MODEL_REGISTRY_MAP,
  DEFAULT_MODEL,
  getModelDef,
  resolveModelId,
  requireModelId,
} from "./model-registry.js";
export type { ModelDef } from "./model-registry.js";
export { DEFAULT_SYSTEM_INSTRUCTION, loadSystemInstruction } from "./system-prompt.js";
export {
  ChronicleError,
  AuthError,
  SessionInitError,
  QuotaExhaustedError,
  UpstreamApiError,
  UnexpectedError,
  UnknownModelError,
  classifyUpstreamError,
} from "./errors.js";
export type { ErrorKind } from "./errors.js";
