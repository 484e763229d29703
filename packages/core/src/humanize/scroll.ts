// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { chance, type Random, randomInt } from "../utils/random.js";
import { randomDelay, shortPause, type TimingConfig } from "./timing.js";

/**
 * One scroll gesture: move the page by `deltaY` pixels (positive is
 * down), then wait `pauseMs`.
 */
export interface ScrollStep {
  readonly deltaY: number;
  readonly pauseMs: number;
}

/**
 * Skim a profile: two or three downward scrolls, each followed by a
 * reading pause, then a partial scroll back up.
 */
export function planReadingScroll(timing: TimingConfig, rng: Random): ScrollStep[] {
  const steps: ScrollStep[] = [];
  const downs = randomInt(rng, 2, 3);
  for (let i = 0; i < downs; i++) {
    steps.push({
      deltaY: randomInt(rng, 300, 600),
      pauseMs: randomDelay(timing.minDelayMs, timing.maxDelayMs, rng),
    });
  }
  steps.push({
    deltaY: -randomInt(rng, 100, 200),
    pauseMs: randomDelay(timing.minDelayMs, timing.maxDelayMs, rng),
  });
  return steps;
}

/**
 * Work through a page of search results. Longer pauses than a profile
 * skim, and an occasional small back-scroll.
 */
export function planResultsScroll(timing: TimingConfig, rng: Random): ScrollStep[] {
  const steps: ScrollStep[] = [];
  const downs = randomInt(rng, 2, 4);
  for (let i = 0; i < downs; i++) {
    steps.push({
      deltaY: randomInt(rng, 400, 800),
      pauseMs: randomDelay(
        Math.max(1000, timing.minDelayMs * 2),
        Math.max(3000, timing.maxDelayMs * 2),
        rng,
      ),
    });
    if (chance(rng, 0.25)) {
      steps.push({ deltaY: -randomInt(rng, 50, 150), pauseMs: shortPause(timing, rng) });
    }
  }
  return steps;
}

/**
 * Browse a feed for about `durationMs` of planned pauses: downward
 * gestures of 200-800px, an occasional small back-scroll once a few
 * have gone by, and now and then a longer stop on a post. The plan ends
 * with the gesture that crosses the duration.
 */
export function planFeedScroll(durationMs: number, timing: TimingConfig, rng: Random): ScrollStep[] {
  const steps: ScrollStep[] = [];
  let planned = 0;
  let downs = 0;
  while (planned < durationMs) {
    let pauseMs = randomDelay(
      Math.max(1000, timing.minDelayMs * 2),
      Math.max(4000, timing.maxDelayMs * 2),
      rng,
    );
    if (chance(rng, 0.3)) {
      pauseMs += randomDelay(2000, 5000, rng);
    }
    steps.push({ deltaY: randomInt(rng, 200, 800), pauseMs });
    planned += pauseMs;
    downs++;

    if (downs > 2 && chance(rng, 0.25)) {
      const back = { deltaY: -randomInt(rng, 50, 200), pauseMs: randomDelay(300, 800, rng) };
      steps.push(back);
      planned += back.pauseMs;
    }
  }
  return steps;
}

/**
 * Split one gesture into 8-12 wheel ticks, 20-50ms apart, whose deltas
 * sum to exactly `distance`.
 */
export function planSmoothScroll(distance: number, rng: Random): ScrollStep[] {
  const total = Math.round(distance);
  const chunks = randomInt(rng, 8, 12);
  const weights = Array.from({ length: chunks }, () => 0.5 + rng.next());
  const weightSum = weights.reduce((sum, w) => sum + w, 0);

  const steps: ScrollStep[] = [];
  let remaining = total;
  weights.forEach((weight, i) => {
    const deltaY = i === chunks - 1 ? remaining : Math.round((total * weight) / weightSum);
    remaining -= deltaY;
    steps.push({ deltaY, pauseMs: randomDelay(20, 50, rng) });
  });
  return steps;
}
