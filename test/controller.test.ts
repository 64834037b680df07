/**
 * controller.test.ts — Conversation controller: retry, truncation, reset.
 *
 * Driven by the scripted in-process client; sleeps are recorded instead
 * of waited unless a test needs a real abortable wait.
 */

import { describe, it, expect } from "vitest";
import {
  backoffDelayMs,
  createConversationController,
  type ConversationConfig,
  type Notice,
  type Sleep,
} from "../src/server/conversation/controller.js";
import { createTranscriptStore, createTurn, type Turn } from "../src/server/conversation/transcript.js";
import { UnknownModelError } from "../src/server/services/gemini/errors.js";
import { apiFailure, createScriptedClient, quota, reply, type ScriptedReply } from "./helpers/fake-gemini.js";
import { makeConversationConfig } from "./helpers/make-state.js";

function priorTurns(n: number): Turn[] {
  return Array.from({ length: n }, (_, i) => createTurn(i % 2 === 0 ? "user" : "model", `turn ${i}`));
}

function recordingSleep() {
  const waits: number[] = [];
  const sleep: Sleep = async (ms, signal) => {
    waits.push(ms);
    if (signal?.aborted) throw new Error("aborted");
  };
  return { waits, sleep };
}

function setup(script: ScriptedReply[], options: { prior?: Turn[]; config?: Partial<ConversationConfig> } = {}) {
  const fake = createScriptedClient(script);
  const { waits, sleep } = recordingSleep();
  const notices: Notice[] = [];
  const controller = createConversationController({
    id: "test",
    client: fake.client,
    config: makeConversationConfig({ backoffUnitMs: 1000, ...options.config }),
    transcript: createTranscriptStore(options.prior ?? []),
    sleep,
  });
  controller.onNotice((n) => notices.push(n));
  return { fake, waits, notices, controller };
}

function seedTexts(history: { parts?: { text?: string }[] }[]): (string | undefined)[] {
  return history.map((h) => h.parts?.[0]?.text);
}

describe("backoffDelayMs", () => {
  it("doubles per attempt", () => {
    expect(backoffDelayMs(1, 1000)).toBe(2000);
    expect(backoffDelayMs(2, 1000)).toBe(4000);
    expect(backoffDelayMs(3, 500)).toBe(4000);
  });

  it("is zero for a zero unit", () => {
    expect(backoffDelayMs(1, 0)).toBe(0);
  });
});

describe("sendWithRecovery — success", () => {
  it("commits the user and model turns", async () => {
    const { controller } = setup([reply("The Rosetta Stone", " was found in 1799.")]);
    const outcome = await controller.sendWithRecovery("When was the Rosetta Stone found?");

    expect(outcome).toEqual({ status: "success", text: "The Rosetta Stone was found in 1799.", attempts: 1 });
    expect(controller.snapshot().map((t) => [t.role, t.text])).toEqual([
      ["user", "When was the Rosetta Stone found?"],
      ["model", "The Rosetta Stone was found in 1799."],
    ]);
    expect(controller.getState()).toBe("success");
  });

  it("reports the concatenated text after every delta", async () => {
    const { controller } = setup([reply("Hel", "lo", "!")]);
    const partials: string[] = [];
    await controller.sendWithRecovery("hi", { onPartial: (text) => partials.push(text) });
    expect(partials).toEqual(["Hel", "Hello", "Hello!"]);
  });

  it("creates the first session lazily, seeded with the transcript", async () => {
    const { controller, fake } = setup([reply("ok")], { prior: priorTurns(4) });
    expect(controller.getSession()).toBeNull();
    await controller.sendWithRecovery("next");
    expect(fake.chats).toHaveLength(1);
    expect(seedTexts(fake.chats[0].history)).toEqual(["turn 0", "turn 1", "turn 2", "turn 3"]);
    expect(fake.chats[0].systemInstruction).toBe("You are a test guide.");
  });

  it("keeps going when the partial listener throws", async () => {
    const { controller, notices } = setup([reply("Part", "ial")], { prior: priorTurns(4) });

    const outcome = await controller.sendWithRecovery("Q", {
      onPartial: () => {
        throw new Error("ui broke");
      },
    });

    expect(outcome).toEqual({ status: "success", text: "Partial", attempts: 1 });
    expect(controller.snapshot()).toHaveLength(6);
    expect(controller.snapshot().slice(-2).map((t) => t.text)).toEqual(["Q", "Partial"]);
    expect(notices).toEqual([]);
  });

  it("reuses the session across sends", async () => {
    const { controller, fake } = setup([reply("one"), reply("two")]);
    await controller.sendWithRecovery("first");
    await controller.sendWithRecovery("second");
    expect(fake.chats).toHaveLength(1);
    expect(fake.sent).toEqual(["first", "second"]);
  });

  it("serializes concurrent sends", async () => {
    const { controller } = setup([reply("one"), reply("two")]);
    await Promise.all([controller.sendWithRecovery("first"), controller.sendWithRecovery("second")]);
    expect(controller.snapshot().map((t) => t.text)).toEqual(["first", "one", "second", "two"]);
  });
});

describe("sendWithRecovery — rate limit recovery", () => {
  it("truncates to the history limit, rebuilds and retries", async () => {
    const { controller, fake, waits, notices } = setup([quota(), reply("Answer")], { prior: priorTurns(10) });

    const outcome = await controller.sendWithRecovery("Q");

    expect(outcome).toEqual({ status: "success", text: "Answer", attempts: 2 });
    expect(fake.sent).toEqual(["Q", "Q"]);
    expect(fake.chats).toHaveLength(2);
    expect(fake.chats[0].history).toHaveLength(10);
    expect(seedTexts(fake.chats[1].history)).toEqual(["turn 4", "turn 5", "turn 6", "turn 7", "turn 8", "turn 9"]);
    expect(waits).toEqual([2000]);
    expect(controller.snapshot()).toHaveLength(8);
    expect(controller.snapshot().slice(-2).map((t) => t.text)).toEqual(["Q", "Answer"]);
    expect(notices).toEqual([
      {
        level: "warning",
        kind: "quota_exhausted",
        message: "Rate limit exceeded (429). Retrying shortly (attempt 1/3).",
        attempt: 1,
        maxAttempts: 3,
      },
    ]);
  });

  it("survives two rate limits with 10 prior turns and a limit of 6", async () => {
    const { controller, fake, waits } = setup([quota(), quota(), reply("Answer")], { prior: priorTurns(10) });

    const outcome = await controller.sendWithRecovery("Q");

    expect(outcome).toEqual({ status: "success", text: "Answer", attempts: 3 });
    expect(fake.chats.map((c) => c.history.length)).toEqual([10, 6, 6]);
    expect(waits).toEqual([2000, 4000]);
    expect(controller.snapshot()).toHaveLength(8);
    expect(controller.snapshot().map((t) => t.text)).toEqual([
      "turn 4", "turn 5", "turn 6", "turn 7", "turn 8", "turn 9", "Q", "Answer",
    ]);
  });

  it("reseeds with nothing when the history limit is 0", async () => {
    const { controller, fake } = setup([quota(), reply("fresh")], {
      prior: priorTurns(4),
      config: { historyLimit: 0 },
    });
    await controller.sendWithRecovery("Q");
    expect(fake.chats[1].history).toEqual([]);
    expect(controller.snapshot().map((t) => t.text)).toEqual(["Q", "fresh"]);
  });

  it("takes per-call retry settings over the configured ones", async () => {
    const { controller, fake, waits } = setup([quota(), quota(), reply("third time")], { prior: priorTurns(6) });
    const outcome = await controller.sendWithRecovery("Q", { maxAttempts: 5, historyLimit: 2 });
    expect(outcome).toEqual({ status: "success", text: "third time", attempts: 3 });
    expect(waits).toEqual([2000, 4000]);
    expect(seedTexts(fake.chats[2].history)).toEqual(["turn 4", "turn 5"]);
  });

  it("resets the conversation once attempts run out", async () => {
    const { controller, fake, waits, notices } = setup([quota(), quota(), quota()], { prior: priorTurns(4) });

    const outcome = await controller.sendWithRecovery("Q");

    expect(outcome).toEqual({
      status: "failed",
      kind: "quota_exhausted",
      message: "Rate limit exceeded: quota exhausted after 3/3 attempts. The conversation has been reset.",
      attempts: 3,
      reset: true,
    });
    expect(waits).toEqual([2000, 4000]);
    expect(fake.sent).toEqual(["Q", "Q", "Q"]);
    expect(controller.snapshot()).toEqual([]);
    expect(controller.getSession()?.binding.seedHistory).toEqual([]);
    expect(controller.getState()).toBe("failed");
    expect(notices.map((n) => [n.level, n.kind])).toEqual([
      ["warning", "quota_exhausted"],
      ["warning", "quota_exhausted"],
      ["error", "quota_exhausted"],
      ["info", "reset"],
    ]);
  });

  it("with a single attempt fails without waiting", async () => {
    const { controller, waits } = setup([quota()], { config: { maxAttempts: 1 } });
    const outcome = await controller.sendWithRecovery("Q");
    expect(outcome.status).toBe("failed");
    expect(outcome.attempts).toBe(1);
    expect(waits).toEqual([]);
  });

  it("fails without reset when the rebuild fails", async () => {
    const { controller, fake } = setup([quota()], { prior: priorTurns(4), config: { historyLimit: 2 } });
    controller.onNotice((n) => {
      if (n.level === "warning") fake.failCreate = new Error("service down");
    });

    const outcome = await controller.sendWithRecovery("Q");

    expect(outcome).toEqual({
      status: "failed",
      kind: "session_init",
      message: "Chat session initialization failed: service down",
      attempts: 1,
      reset: false,
    });
    expect(controller.snapshot().map((t) => t.text)).toEqual(["turn 2", "turn 3"]);
    expect(controller.getSession()).toBeNull();
  });
});

describe("sendWithRecovery — non-recoverable errors", () => {
  it("resets on an API error without retrying", async () => {
    const { controller, fake, waits, notices } = setup([apiFailure(500)], { prior: priorTurns(2) });

    const outcome = await controller.sendWithRecovery("Q");

    expect(outcome.status).toBe("failed");
    if (outcome.status !== "failed") return;
    expect(outcome.kind).toBe("api_error");
    expect(outcome.attempts).toBe(1);
    expect(outcome.reset).toBe(true);
    expect(outcome.message).toMatch(/^API error: .*backend unavailable.*\. The conversation has been reset\.$/);
    expect(fake.sent).toEqual(["Q"]);
    expect(waits).toEqual([]);
    expect(controller.snapshot()).toEqual([]);
    expect(notices[0].detail).toEqual({ status: 500 });
  });

  it("classifies 403 as an authentication failure", async () => {
    const { controller } = setup([apiFailure(403, "permission denied")]);
    const outcome = await controller.sendWithRecovery("Q");
    expect(outcome.status === "failed" && outcome.kind).toBe("auth");
  });

  it("treats unknown throws as unexpected", async () => {
    const { controller } = setup([{ chunks: ["par"], error: new TypeError("socket hang up") }]);
    const outcome = await controller.sendWithRecovery("Q");
    expect(outcome).toEqual({
      status: "failed",
      kind: "unexpected",
      message: "Unexpected error: socket hang up. The conversation has been reset.",
      attempts: 1,
      reset: true,
    });
  });

  it("never commits a half-streamed reply", async () => {
    const { controller } = setup([{ chunks: ["partial"], error: new Error("cut") }], { prior: priorTurns(2) });
    await controller.sendWithRecovery("Q");
    expect(controller.snapshot()).toEqual([]);
  });
});

describe("sendWithRecovery — validation and setup failures", () => {
  it("rejects a blank prompt", async () => {
    const { controller, fake } = setup([]);
    const outcome = await controller.sendWithRecovery("   ");
    expect(outcome).toEqual({
      status: "failed",
      kind: "invalid_request",
      message: "Message must not be empty.",
      attempts: 0,
      reset: false,
    });
    expect(fake.sent).toEqual([]);
  });

  it("rejects invalid retry settings", async () => {
    const { controller } = setup([]);
    const outcome = await controller.sendWithRecovery("Q", { maxAttempts: 0 });
    expect(outcome).toEqual({
      status: "failed",
      kind: "invalid_request",
      message: "Invalid retry settings: maxAttempts=0, historyLimit=6",
      attempts: 0,
      reset: false,
    });
  });

  it("fails with session_init when there is no client", async () => {
    const controller = createConversationController({ client: null, config: makeConversationConfig() });
    const outcome = await controller.sendWithRecovery("Q");
    expect(outcome).toEqual({
      status: "failed",
      kind: "session_init",
      message: "No authenticated Gemini client — configure GEMINI_API_KEY",
      attempts: 0,
      reset: false,
    });
  });

  it("delivers per-call notices only to that call", async () => {
    const { controller } = setup([quota(), reply("a"), reply("b")]);
    const first: Notice[] = [];
    const second: Notice[] = [];
    await Promise.all([
      controller.sendWithRecovery("one", { onNotice: (n) => first.push(n) }),
      controller.sendWithRecovery("two", { onNotice: (n) => second.push(n) }),
    ]);
    expect(first.map((n) => n.kind)).toEqual(["quota_exhausted"]);
    expect(second).toEqual([]);
  });
});

describe("sendWithRecovery — cancellation", () => {
  it("stops mid-stream and commits nothing", async () => {
    const { controller } = setup([reply("Part", "ial")], { prior: priorTurns(2) });
    const abort = new AbortController();

    const outcome = await controller.sendWithRecovery("Q", {
      signal: abort.signal,
      onPartial: () => abort.abort(),
    });

    expect(outcome).toEqual({ status: "cancelled", attempts: 1 });
    expect(controller.snapshot()).toHaveLength(2);
    expect(controller.getSession()).toBeNull();
    expect(controller.getState()).toBe("cancelled");
  });

  it("cancel() interrupts the backoff wait", async () => {
    const fake = createScriptedClient([quota()]);
    const controller = createConversationController({
      client: fake.client,
      // Real abortable wait; a minute would time the test out if not interrupted
      config: makeConversationConfig({ backoffUnitMs: 60_000 }),
    });
    const notices: Notice[] = [];
    controller.onNotice((n) => {
      notices.push(n);
      if (n.level === "warning") controller.cancel();
    });

    const outcome = await controller.sendWithRecovery("Q");

    expect(outcome).toEqual({ status: "cancelled", attempts: 1 });
    expect(notices.map((n) => n.kind)).toEqual(["quota_exhausted", "cancelled"]);
    expect(fake.sent).toEqual(["Q"]);
  });

  it("runs sends issued after cancel() normally", async () => {
    const { controller } = setup([reply("ok")]);
    controller.cancel();
    expect(await controller.sendWithRecovery("Q")).toEqual({ status: "success", text: "ok", attempts: 1 });
  });

  it("returns cancelled at once for an already-aborted signal", async () => {
    const { controller, fake } = setup([reply("never")]);
    const outcome = await controller.sendWithRecovery("Q", { signal: AbortSignal.abort() });
    expect(outcome).toEqual({ status: "cancelled", attempts: 0 });
    expect(fake.sent).toEqual([]);
  });
});

describe("reset", () => {
  it("clears history and binds an empty session", async () => {
    const { controller, fake, notices } = setup([reply("ok")], { prior: priorTurns(4) });
    await controller.sendWithRecovery("Q");

    const outcome = await controller.reset();

    expect(outcome).toEqual({ sessionReady: true });
    expect(controller.snapshot()).toEqual([]);
    expect(fake.chats.at(-1)?.history).toEqual([]);
    expect(controller.getState()).toBe("idle");
    expect(notices.at(-1)).toEqual({ level: "info", kind: "reset", message: "Conversation reset." });
  });

  it("reports a failed rebuild without throwing", async () => {
    const { controller, fake, notices } = setup([reply("ok")]);
    await controller.sendWithRecovery("Q");
    fake.failCreate = new Error("boom");

    const outcome = await controller.reset();

    expect(outcome).toEqual({ sessionReady: false });
    expect(controller.snapshot()).toEqual([]);
    expect(controller.getSession()).toBeNull();
    expect(notices.slice(-2)).toEqual([
      { level: "info", kind: "reset", message: "Conversation reset." },
      {
        level: "error",
        kind: "session_init",
        message: "Chat session initialization failed after reset: Chat session initialization failed: boom",
      },
    ]);
  });

  it("has no session to build without a client", async () => {
    const controller = createConversationController({ client: null, config: makeConversationConfig() });
    expect(await controller.reset()).toEqual({ sessionReady: false });
  });
});

describe("changeModel", () => {
  it("keeps the transcript and seeds the next session on the new model", async () => {
    const { controller, fake } = setup([reply("one"), reply("two")]);
    await controller.sendWithRecovery("first");

    expect(await controller.changeModel("gemini-2.5-flash")).toBe(true);
    expect(controller.getModel()).toBe("gemini-2.5-flash");
    expect(controller.getSession()).toBeNull();
    expect(controller.snapshot()).toHaveLength(2);

    await controller.sendWithRecovery("second");
    expect(fake.chats[0].model).toBe("gemini-2.0-flash");
    expect(fake.chats[1].model).toBe("gemini-2.5-flash");
    expect(seedTexts(fake.chats[1].history)).toEqual(["first", "one"]);
  });

  it("is a no-op for the current model", async () => {
    const { controller } = setup([]);
    expect(await controller.changeModel("gemini-2.0-flash")).toBe(false);
  });

  it("rejects unknown models", async () => {
    const { controller } = setup([]);
    await expect(controller.changeModel("gemini-0.1-ultra")).rejects.toBeInstanceOf(UnknownModelError);
    expect(controller.getModel()).toBe("gemini-2.0-flash");
  });
});
