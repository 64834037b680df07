/**
 * sse.ts — Server-Sent Events writer
 *
 * Minimal framing for the chat stream:
 *   event: <name>\n
 *   data: <json>\n\n
 */

import type { Response } from "express";

export interface EventStream {
  send(event: string, data: unknown): void;
  end(): void;
  /** True once the client went away or end() was called. */
  readonly closed: boolean;
}

export function openEventStream(res: Response): EventStream {
  res.status(200);
  res.setHeader("Content-Type", "text/event-stream; charset=utf-8");
  res.setHeader("Cache-Control", "no-cache, no-transform");
  res.setHeader("Connection", "keep-alive");
  // Disable proxy buffering (nginx) so partials arrive as they are produced
  res.setHeader("X-Accel-Buffering", "no");
  res.flushHeaders();

  let closed = false;
  res.on("close", () => {
    closed = true;
  });

  return {
    send(event: string, data: unknown): void {
      if (closed || res.writableEnded) return;
      res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
    },
    end(): void {
      if (!res.writableEnded) res.end();
      closed = true;
    },
    get closed(): boolean {
      return closed || res.writableEnded;
    },
  };
}
