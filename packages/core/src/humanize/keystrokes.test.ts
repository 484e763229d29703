// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { describe, expect, it } from "vitest";

import { createSeededRandom } from "../utils/random.js";
import {
  adjacentKeys,
  DEFAULT_TYPING_OPTIONS,
  planKeystrokes,
  replayKeystrokes,
} from "./keystrokes.js";

describe("adjacentKeys", () => {
  it("lists QWERTY neighbours", () => {
    expect([...adjacentKeys("s")].sort()).toEqual(["a", "d", "e", "w", "x", "z"]);
  });

  it("preserves upper case", () => {
    expect(adjacentKeys("Q")).toEqual(["W", "1", "2", "A"]);
  });

  it("is empty for keys off the layout", () => {
    expect(adjacentKeys("é")).toEqual([]);
    expect(adjacentKeys(" ")).toEqual([]);
  });
});

describe("planKeystrokes", () => {
  const text = "Hello Dana, great to meet you!\nBest";

  it("replays to the original text", () => {
    for (let seed = 0; seed < 30; seed++) {
      const events = planKeystrokes(text, createSeededRandom(seed), {
        ...DEFAULT_TYPING_OPTIONS,
        typoProbability: 0.3,
      });
      expect(replayKeystrokes(events)).toBe(text);
    }
  });

  it("emits one char event per character", () => {
    const events = planKeystrokes(text, createSeededRandom(4), {
      ...DEFAULT_TYPING_OPTIONS,
      typoProbability: 0.5,
    });
    const chars = events.filter((e) => e.kind === "key" && e.intent === "char");
    expect(chars).toHaveLength(Array.from(text).length);
  });

  it("follows every typo with a backspace and the intended key", () => {
    const events = planKeystrokes("asdf", { next: () => 0 }, {
      ...DEFAULT_TYPING_OPTIONS,
      typoProbability: 1,
      hesitationProbability: 0,
    });
    expect(events.map((e) => (e.kind === "key" ? `${e.intent}:${e.key}` : "pause"))).toEqual([
      "typo:s",
      "backspace:Backspace",
      "char:a",
      "typo:a",
      "backspace:Backspace",
      "char:s",
      "typo:s",
      "backspace:Backspace",
      "char:d",
      "typo:d",
      "backspace:Backspace",
      "char:f",
    ]);
  });

  it("produces no typos when disabled", () => {
    const events = planKeystrokes("typing", createSeededRandom(8), {
      ...DEFAULT_TYPING_OPTIONS,
      typoProbability: 0,
      hesitationProbability: 0,
    });
    expect(events).toHaveLength(6);
    for (const e of events) {
      expect(e.kind === "key" && e.intent).toBe("char");
      expect(e.delayMs).toBeGreaterThanOrEqual(35);
      expect(e.delayMs).toBeLessThanOrEqual(95);
    }
  });

  it("may hesitate before any character but the first", () => {
    const events = planKeystrokes("ab", { next: () => 0 }, {
      ...DEFAULT_TYPING_OPTIONS,
      typoProbability: 0,
      hesitationProbability: 1,
    });
    expect(events.map((e) => e.kind)).toEqual(["key", "pause", "key"]);
    expect(events[1]?.delayMs).toBe(250);
  });

  it("hesitates more readily at word starts", () => {
    // 0.06 clears the mid-word odds (0.04) but not the word-start odds (0.12).
    const events = planKeystrokes("ab cd", { next: () => 0.06 }, DEFAULT_TYPING_OPTIONS);
    expect(events.map((e) => e.kind)).toEqual(["key", "key", "key", "pause", "key", "key"]);
    expect(events[3]?.delayMs).toBe(289);
  });

  it("hesitates before a few percent of characters over a long message", () => {
    const sentences = [
      "Thanks for sharing the notes from the planning session last week.",
      "I would love to compare how your team handles quarterly reviews.",
      "Happy to set up a short call whenever your calendar opens up.",
    ];
    const parts: string[] = [];
    for (let i = 0; i < 200; i++) {
      parts.push(sentences[i % sentences.length] ?? "");
    }
    const long = parts.join(" ");
    const chars = Array.from(long).length;
    expect(chars).toBeGreaterThan(12_000);

    const events = planKeystrokes(long, createSeededRandom(7));
    const pauses = events.filter((e) => e.kind === "pause").length;
    expect(pauses / chars).toBeGreaterThanOrEqual(0.02);
    expect(pauses / chars).toBeLessThanOrEqual(0.1);
  });

  it("types line breaks without submitting", () => {
    const events = planKeystrokes("a\nb", createSeededRandom(1), {
      ...DEFAULT_TYPING_OPTIONS,
      typoProbability: 0,
    });
    expect(events.some((e) => e.kind === "key" && e.key === "Shift+Enter")).toBe(true);
  });
});
