/**
 * transcript.ts — Transcript Store
 *
 * Ordered, append-only log of conversation turns. Turns are frozen on
 * creation and never edited in place. The store does not enforce
 * user/model alternation; the controller only ever commits complete pairs.
 */

export type TurnRole = "user" | "model";

export interface Turn {
  readonly role: TurnRole;
  readonly text: string;
  /** ISO-8601 creation time */
  readonly timestamp: string;
}

export interface TranscriptStore {
  append(turn: Turn): void;
  /** Frozen copy of every turn, in order. */
  snapshot(): readonly Turn[];
  /** The last `limit` turns (fewer if shorter). Does not mutate the store. */
  truncate(limit: number): readonly Turn[];
  /** Replace the store's contents, e.g. with the result of truncate(). */
  replace(turns: readonly Turn[]): void;
  clear(): void;
  readonly length: number;
}

export function createTurn(role: TurnRole, text: string, now: Date = new Date()): Turn {
  return Object.freeze({ role, text, timestamp: now.toISOString() });
}

export function createTranscriptStore(initial: readonly Turn[] = []): TranscriptStore {
  let turns: Turn[] = [...initial];

  return {
    append(turn: Turn): void {
      turns.push(turn);
    },

    snapshot(): readonly Turn[] {
      return Object.freeze([...turns]);
    },

    truncate(limit: number): readonly Turn[] {
      if (!Number.isInteger(limit) || limit < 0) {
        throw new RangeError(`History limit must be a non-negative integer, got ${limit}`);
      }
      // slice(-0) would return everything
      return Object.freeze(limit === 0 ? [] : turns.slice(-limit));
    },

    replace(next: readonly Turn[]): void {
      turns = [...next];
    },

    clear(): void {
      turns = [];
    },

    get length(): number {
      return turns.length;
    },
  };
}
