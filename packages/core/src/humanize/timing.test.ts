// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { describe, expect, it } from "vitest";

import { createSeededRandom } from "../utils/random.js";
import {
  hoverPause,
  pacingDelay,
  randomDelay,
  shortPause,
  thinkPause,
} from "./timing.js";

const timing = { minDelayMs: 750, maxDelayMs: 2250 };

describe("randomDelay", () => {
  it("stays within inclusive bounds", () => {
    const rng = createSeededRandom(1);
    for (let i = 0; i < 500; i++) {
      const d = randomDelay(100, 200, rng);
      expect(Number.isInteger(d)).toBe(true);
      expect(d).toBeGreaterThanOrEqual(100);
      expect(d).toBeLessThanOrEqual(200);
    }
  });

  it("reaches both ends", () => {
    expect(randomDelay(10, 20, { next: () => 0 })).toBe(10);
    expect(randomDelay(10, 20, { next: () => 0.9999 })).toBe(20);
  });

  it("clamps a negative minimum to zero", () => {
    expect(randomDelay(-50, 10, { next: () => 0 })).toBe(0);
  });

  it("raises max to min when inverted", () => {
    expect(randomDelay(300, 100, { next: () => 0.9999 })).toBe(300);
  });
});

describe("derived pauses", () => {
  it("shortPause scales from the base minimum", () => {
    expect(shortPause(timing, { next: () => 0 })).toBe(125);
    expect(shortPause(timing, { next: () => 0.9999 })).toBe(188);
  });

  it("shortPause keeps its floors for fast timing", () => {
    const fast = { minDelayMs: 60, maxDelayMs: 100 };
    expect(shortPause(fast, { next: () => 0 })).toBe(40);
    expect(shortPause(fast, { next: () => 0.9999 })).toBe(80);
  });

  it("thinkPause never drops below 400ms", () => {
    const fast = { minDelayMs: 100, maxDelayMs: 200 };
    expect(thinkPause(fast, { next: () => 0 })).toBe(400);
    expect(thinkPause(fast, { next: () => 0.9999 })).toBe(800);
  });

  it("hoverPause spans 500-1200ms", () => {
    expect(hoverPause({ next: () => 0 })).toBe(500);
    expect(hoverPause({ next: () => 0.9999 })).toBe(1200);
  });
});

describe("pacingDelay", () => {
  it("enforces the floor over a lower configured range", () => {
    const rng = createSeededRandom(3);
    for (let i = 0; i < 200; i++) {
      expect(pacingDelay([1000, 2000], 5000, rng)).toBe(5000);
    }
  });

  it("uses the configured range above the floor", () => {
    expect(pacingDelay([8000, 13000], 5000, { next: () => 0 })).toBe(8000);
    expect(pacingDelay([8000, 13000], 5000, { next: () => 0.9999 })).toBe(13000);
  });
});
