/**
 * controller.ts — Resilient conversation controller
 *
 * Owns one conversation: its transcript, its current upstream session and
 * the retry state machine that sits between them.
 *
 *   idle → sending → success
 *                  → rate_limited → sending (next attempt)
 *                  → failed
 *                  → cancelled
 *
 * Recovery from quota exhaustion: keep only the last `historyLimit`
 * committed turns, rebuild the session seeded with them, back off for
 * 2^attempt time units, resend the same prompt. When attempts run out, or
 * on any non-quota upstream error, the whole conversation is reset.
 *
 * Nothing thrown upstream escapes sendWithRecovery()/reset(): every failure
 * becomes a Notice plus a SendOutcome.
 */

import { setTimeout as delay } from "node:timers/promises";
import { log } from "../logger.js";
import type { GeminiClient } from "../services/gemini/client.js";
import {
  type ChronicleError,
  type ErrorKind,
  QuotaExhaustedError,
  SessionInitError,
  UpstreamApiError,
  classifyUpstreamError,
} from "../services/gemini/errors.js";
import { requireModelId } from "../services/gemini/model-registry.js";
import { createSessionFactory, type ChatSession, type SessionFactory } from "./session-factory.js";
import { createTranscriptStore, createTurn, type TranscriptStore, type Turn } from "./transcript.js";

// ─── Types ────────────────────────────────────────────────────

export type ControllerState = "idle" | "sending" | "rate_limited" | "success" | "failed" | "cancelled";

export interface ConversationConfig {
  modelName: string;
  systemInstruction: string;
  /** Committed turns kept when recovering from a rate limit (raw turns, not pairs). */
  historyLimit: number;
  maxAttempts: number;
  /** Length of one backoff time unit. */
  backoffUnitMs: number;
}

export interface Notice {
  level: "info" | "warning" | "error";
  kind: ErrorKind | "reset" | "cancelled";
  message: string;
  attempt?: number;
  maxAttempts?: number;
  detail?: Record<string, unknown>;
}

export type NoticeListener = (notice: Notice) => void;

export type SendOutcome =
  | { status: "success"; text: string; attempts: number }
  | { status: "failed"; kind: ErrorKind; message: string; attempts: number; reset: boolean }
  | { status: "cancelled"; attempts: number };

export interface SendOptions {
  maxAttempts?: number;
  historyLimit?: number;
  /** Aborts the in-flight attempt between chunks, or the backoff wait. */
  signal?: AbortSignal;
  /** Receives the concatenated response after every streamed delta. */
  onPartial?: (text: string) => void;
  /** Receives the notices raised while this call runs (after onNotice listeners). */
  onNotice?: NoticeListener;
}

export interface ResetOutcome {
  /** Whether an empty session was rebuilt eagerly. */
  sessionReady: boolean;
}

/** Suspending wait. Must reject when `signal` aborts. */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface ConversationControllerOptions {
  id?: string;
  client: GeminiClient | null;
  config: ConversationConfig;
  sessionFactory?: SessionFactory;
  transcript?: TranscriptStore;
  sleep?: Sleep;
}

export interface ConversationController {
  readonly id: string;
  sendWithRecovery(prompt: string, options?: SendOptions): Promise<SendOutcome>;
  /** Clear the transcript and start over with an empty session. Never throws. */
  reset(): Promise<ResetOutcome>;
  /**
   * Switch models. Only the session is invalidated — the transcript is kept
   * and seeds the next session. Throws UnknownModelError for unlisted models.
   * Resolves true when the model actually changed.
   */
  changeModel(modelName: string): Promise<boolean>;
  /**
   * Abort the send in flight (between chunks or during backoff) and every
   * send already queued behind it. Sends issued afterwards run normally.
   */
  cancel(): void;
  getState(): ControllerState;
  getModel(): string;
  /** Current session, or null when invalidated and not yet rebuilt. */
  getSession(): ChatSession | null;
  snapshot(): readonly Turn[];
  onNotice(listener: NoticeListener): () => void;
  /** Epoch ms of the last operation, for idle expiry. */
  lastAccess(): number;
}

// ─── Helpers ──────────────────────────────────────────────────

export const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/** Wait before the attempt after `attempt`: 2^attempt units (2, 4, 8, …). */
export function backoffDelayMs(attempt: number, unitMs: number): number {
  return Math.pow(2, attempt) * unitMs;
}

function combineSignals(own: AbortSignal, external?: AbortSignal): AbortSignal {
  return external ? AbortSignal.any([own, external]) : own;
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ─── Implementation ───────────────────────────────────────────

export function createConversationController(options: ConversationControllerOptions): ConversationController {
  const id = options.id ?? "default";
  const client = options.client;
  const config: ConversationConfig = { ...options.config };
  const sessionFactory = options.sessionFactory ?? createSessionFactory();
  const transcript = options.transcript ?? createTranscriptStore();
  const sleep = options.sleep ?? defaultSleep;

  let session: ChatSession | null = null;
  let state: ControllerState = "idle";
  let inflight: AbortController | null = null;
  /** Bumped by cancel(); sends queued under an older generation never start. */
  let generation = 0;
  let lastAccess = Date.now();
  const listeners = new Set<NoticeListener>();
  /** Per-call listener of the send currently holding the lock. */
  let callListener: NoticeListener | null = null;

  /** Serializes send/reset/changeModel so nothing interleaves with a suspended send. */
  let lock: Promise<void> = Promise.resolve();
  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const prev = lock;
    let release: () => void;
    lock = new Promise<void>((r) => { release = r; });
    return prev.then(fn).finally(() => release());
  }

  function emit(notice: Notice): void {
    const targets = callListener ? [...listeners, callListener] : [...listeners];
    for (const listener of targets) {
      try {
        listener(notice);
      } catch (err) {
        log.conversation.warn({ conversationId: id, err: errorText(err) }, "notice listener threw");
      }
    }
  }

  function buildSession(seed: readonly Turn[]): ChatSession {
    return sessionFactory.create(client, config.systemInstruction, config.modelName, seed);
  }

  /** Current session, created lazily (seeded with the full transcript) after invalidation. */
  function currentSession(): ChatSession {
    if (!session) {
      session = buildSession(transcript.snapshot());
    }
    return session;
  }

  async function resetUnlocked(): Promise<ResetOutcome> {
    transcript.clear();
    session = null;
    log.conversation.info({ conversationId: id }, "conversation:reset");
    emit({ level: "info", kind: "reset", message: "Conversation reset." });

    if (!client) return { sessionReady: false };
    try {
      session = buildSession([]);
      return { sessionReady: true };
    } catch (err) {
      const message = `Chat session initialization failed after reset: ${errorText(err)}`;
      log.conversation.error({ conversationId: id, err: errorText(err) }, "reset:rebuild failed");
      emit({ level: "error", kind: "session_init", message });
      return { sessionReady: false };
    }
  }

  function cancelled(attempts: number): SendOutcome {
    // The SDK chat may hold half an exchange; rebuild from the transcript next time.
    session = null;
    state = "cancelled";
    log.conversation.info({ conversationId: id, attempts }, "send:cancelled");
    emit({ level: "info", kind: "cancelled", message: "Request cancelled." });
    return { status: "cancelled", attempts };
  }

  function sessionInitFailure(err: unknown, attempts: number): SendOutcome {
    session = null;
    state = "failed";
    const message = err instanceof SessionInitError ? err.message : `Chat session initialization failed: ${errorText(err)}`;
    log.conversation.error({ conversationId: id, model: config.modelName, err: message }, "send:session-init failed");
    emit({ level: "error", kind: "session_init", message });
    return { status: "failed", kind: "session_init", message, attempts, reset: false };
  }

  async function terminalFailure(error: ChronicleError, attempts: number, maxAttempts: number): Promise<SendOutcome> {
    state = "failed";
    let message: string;
    const detail: Record<string, unknown> = {};
    switch (error.kind) {
      case "quota_exhausted":
        message = `Rate limit exceeded: quota exhausted after ${attempts}/${maxAttempts} attempts. The conversation has been reset.`;
        break;
      case "auth":
        message = `Authentication failed: ${error.message}. The conversation has been reset.`;
        break;
      case "api_error":
        message = `API error: ${error.message}. The conversation has been reset.`;
        if (error instanceof UpstreamApiError) detail.status = error.status;
        break;
      default:
        message = `Unexpected error: ${error.message}. The conversation has been reset.`;
    }
    log.conversation.error({ conversationId: id, kind: error.kind, attempts, err: error.message }, "send:failed");
    emit({
      level: "error",
      kind: error.kind,
      message,
      attempt: attempts,
      maxAttempts,
      ...(Object.keys(detail).length > 0 ? { detail } : {}),
    });
    await resetUnlocked();
    return { status: "failed", kind: error.kind, message, attempts, reset: true };
  }

  async function streamReply(
    active: ChatSession,
    prompt: string,
    signal: AbortSignal,
    onPartial?: (text: string) => void,
  ): Promise<string> {
    let full = "";
    for await (const delta of active.sendMessage(prompt, signal)) {
      if (signal.aborted) break;
      full += delta;
      if (onPartial) {
        try {
          onPartial(full);
        } catch (err) {
          log.conversation.warn({ conversationId: id, err: errorText(err) }, "partial listener threw");
        }
      }
    }
    return full;
  }

  async function runSend(prompt: string, opts: SendOptions, signal: AbortSignal): Promise<SendOutcome> {
    const maxAttempts = opts.maxAttempts ?? config.maxAttempts;
    const historyLimit = opts.historyLimit ?? config.historyLimit;

    if (!Number.isInteger(maxAttempts) || maxAttempts < 1 || !Number.isInteger(historyLimit) || historyLimit < 0) {
      const message = `Invalid retry settings: maxAttempts=${maxAttempts}, historyLimit=${historyLimit}`;
      emit({ level: "error", kind: "invalid_request", message });
      return { status: "failed", kind: "invalid_request", message, attempts: 0, reset: false };
    }
    if (!prompt.trim()) {
      const message = "Message must not be empty.";
      emit({ level: "error", kind: "invalid_request", message });
      return { status: "failed", kind: "invalid_request", message, attempts: 0, reset: false };
    }

    // Pending until the model answers — a failed attempt never leaves it behind.
    const pending = createTurn("user", prompt);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal.aborted) return cancelled(attempt - 1);

      let active: ChatSession;
      try {
        active = currentSession();
      } catch (err) {
        return sessionInitFailure(err, attempt - 1);
      }

      state = "sending";
      log.conversation.debug({ conversationId: id, attempt, maxAttempts, historyLen: transcript.length }, "send:attempt");

      let text: string;
      try {
        text = await streamReply(active, prompt, signal, opts.onPartial);
      } catch (err) {
        if (signal.aborted) return cancelled(attempt);
        const error = classifyUpstreamError(err);
        if (!(error instanceof QuotaExhaustedError) || attempt >= maxAttempts) {
          return terminalFailure(error, attempt, maxAttempts);
        }

        // ── Recovery: truncate, rebuild, back off ──────────────
        state = "rate_limited";
        const waitMs = backoffDelayMs(attempt, config.backoffUnitMs);
        log.conversation.warn({ conversationId: id, attempt, maxAttempts, waitMs, historyLimit }, "send:rate-limited");
        emit({
          level: "warning",
          kind: "quota_exhausted",
          message: `Rate limit exceeded (429). Retrying shortly (attempt ${attempt}/${maxAttempts}).`,
          attempt,
          maxAttempts,
        });

        const seed = transcript.truncate(historyLimit);
        transcript.replace(seed);
        session = null;
        try {
          session = buildSession(seed);
        } catch (initErr) {
          return sessionInitFailure(initErr, attempt);
        }

        try {
          await sleep(waitMs, signal);
        } catch (sleepErr) {
          if (signal.aborted) return cancelled(attempt);
          return terminalFailure(classifyUpstreamError(sleepErr), attempt, maxAttempts);
        }
        continue;
      }

      if (signal.aborted) return cancelled(attempt);

      transcript.append(pending);
      transcript.append(createTurn("model", text));
      state = "success";
      log.conversation.debug({ conversationId: id, attempt, responseLen: text.length, historyLen: transcript.length }, "send:success");
      return { status: "success", text, attempts: attempt };
    }

    // Unreachable: the final attempt always returns above.
    return terminalFailure(new QuotaExhaustedError("retry budget exhausted"), maxAttempts, maxAttempts);
  }

  return {
    id,

    sendWithRecovery(prompt: string, opts: SendOptions = {}): Promise<SendOutcome> {
      const queuedAt = generation;
      return withLock(async () => {
        lastAccess = Date.now();
        const own = new AbortController();
        inflight = own;
        callListener = opts.onNotice ?? null;
        if (queuedAt !== generation) own.abort();
        try {
          return await runSend(prompt, opts, combineSignals(own.signal, opts.signal));
        } catch (err) {
          // Listener or bookkeeping failures still end in a defined state.
          return terminalFailure(classifyUpstreamError(err), 0, opts.maxAttempts ?? config.maxAttempts);
        } finally {
          if (inflight === own) inflight = null;
          callListener = null;
          lastAccess = Date.now();
        }
      });
    },

    reset(): Promise<ResetOutcome> {
      return withLock(async () => {
        lastAccess = Date.now();
        const outcome = await resetUnlocked();
        state = "idle";
        return outcome;
      });
    },

    async changeModel(modelName: string): Promise<boolean> {
      requireModelId(modelName);
      return withLock(async () => {
        lastAccess = Date.now();
        if (modelName === config.modelName) return false;
        const previousModel = config.modelName;
        config.modelName = modelName;
        session = null;
        log.conversation.info({ conversationId: id, previousModel, newModel: modelName, historyLen: transcript.length }, "model:switch");
        return true;
      });
    },

    cancel(): void {
      generation++;
      inflight?.abort();
    },

    getState(): ControllerState {
      return state;
    },

    getModel(): string {
      return config.modelName;
    },

    getSession(): ChatSession | null {
      return session;
    },

    snapshot(): readonly Turn[] {
      return transcript.snapshot();
    },

    onNotice(listener: NoticeListener): () => void {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    lastAccess(): number {
      return lastAccess;
    },
  };
}
