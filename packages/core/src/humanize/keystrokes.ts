// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { chance, pick, type Random } from "../utils/random.js";
import { type DelayRange, randomDelay } from "./timing.js";

/**
 * A single planned keyboard event.
 *
 * `key` is either one printable character or a named key understood by
 * the automation driver (`Backspace`, `Shift+Enter`).
 */
export type KeystrokeEvent =
  | {
      readonly kind: "key";
      readonly key: string;
      readonly intent: "char" | "typo" | "backspace";
      readonly delayMs: number;
    }
  | { readonly kind: "pause"; readonly delayMs: number };

export interface TypingOptions {
  readonly keyDelayMs: DelayRange;
  readonly typoProbability: number;
  readonly hesitationProbability: number;
  readonly hesitationMs: DelayRange;
  readonly correctionDelayMs: DelayRange;
}

export const DEFAULT_TYPING_OPTIONS: TypingOptions = {
  keyDelayMs: [35, 95],
  typoProbability: 0.05,
  hesitationProbability: 0.04,
  hesitationMs: [250, 900],
  correctionDelayMs: [25, 60],
};

export const BACKSPACE = "Backspace";
/** Line break inside a compose box without submitting it. */
export const SOFT_NEWLINE = "Shift+Enter";

const WORD_START_HESITATION_BIAS = 3;

const QWERTY_ROWS = ["1234567890-=", "qwertyuiop[]", "asdfghjkl;'", "zxcvbnm,./"];

const NEIGHBORS: ReadonlyMap<string, readonly string[]> = buildNeighbors(QWERTY_ROWS);

/**
 * Keys physically adjacent to `char` on a QWERTY layout, matching the
 * case of `char`. Empty for characters off the main block.
 */
export function adjacentKeys(char: string): readonly string[] {
  const lower = char.toLowerCase();
  const neighbors = NEIGHBORS.get(lower) ?? [];
  if (char !== lower) {
    return neighbors.map((n) => n.toUpperCase());
  }
  return neighbors;
}

/**
 * Plan the key events that type `text`.
 *
 * Each character becomes one `char` event. Occasionally a neighbouring
 * key is hit first, then erased with a backspace. Any character after
 * the first may be preceded by a hesitation pause, three times as likely
 * at a word start. Replaying the plan yields `text`.
 */
export function planKeystrokes(
  text: string,
  rng: Random,
  options: TypingOptions = DEFAULT_TYPING_OPTIONS,
): KeystrokeEvent[] {
  const events: KeystrokeEvent[] = [];
  let previous = "";

  for (const char of Array.from(text)) {
    const wordStart = /\s/.test(previous) && !/\s/.test(char);
    const hesitation = Math.min(
      1,
      options.hesitationProbability * (wordStart ? WORD_START_HESITATION_BIAS : 1),
    );
    if (previous !== "" && chance(rng, hesitation)) {
      events.push({ kind: "pause", delayMs: delayIn(options.hesitationMs, rng) });
    }

    const key = char === "\n" ? SOFT_NEWLINE : char;
    const typo = chance(rng, options.typoProbability)
      ? pick(rng, adjacentKeys(char))
      : undefined;

    if (typo !== undefined) {
      events.push({ kind: "key", key: typo, intent: "typo", delayMs: delayIn(options.keyDelayMs, rng) });
      events.push({
        kind: "key",
        key: BACKSPACE,
        intent: "backspace",
        delayMs: delayIn(options.correctionDelayMs, rng),
      });
      events.push({ kind: "key", key, intent: "char", delayMs: delayIn(options.correctionDelayMs, rng) });
    } else {
      events.push({ kind: "key", key, intent: "char", delayMs: delayIn(options.keyDelayMs, rng) });
    }

    previous = char;
  }

  return events;
}

/**
 * Text a field would contain after receiving `events`.
 */
export function replayKeystrokes(events: readonly KeystrokeEvent[]): string {
  const chars: string[] = [];
  for (const event of events) {
    if (event.kind !== "key") continue;
    if (event.key === BACKSPACE) {
      chars.pop();
    } else if (event.key === SOFT_NEWLINE) {
      chars.push("\n");
    } else {
      chars.push(event.key);
    }
  }
  return chars.join("");
}

function delayIn(range: DelayRange, rng: Random): number {
  return randomDelay(range[0], range[1], rng);
}

function buildNeighbors(rows: readonly string[]): Map<string, string[]> {
  const map = new Map<string, string[]>();
  rows.forEach((row, r) => {
    Array.from(row).forEach((key, i) => {
      const candidates = [
        row[i - 1],
        row[i + 1],
        rows[r - 1]?.[i],
        rows[r - 1]?.[i + 1],
        rows[r + 1]?.[i - 1],
        rows[r + 1]?.[i],
      ];
      map.set(
        key,
        candidates.filter((c): c is string => c !== undefined),
      );
    });
  });
  return map;
}
