// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { type Random, randomInt } from "../utils/random.js";

/** Inclusive `[min, max]` interval in milliseconds. */
export type DelayRange = readonly [min: number, max: number];

/**
 * Base action timing. Derived pauses scale from these two values.
 */
export interface TimingConfig {
  readonly minDelayMs: number;
  readonly maxDelayMs: number;
}

/**
 * Draw a delay uniformly from `[minMs, maxMs]`.
 *
 * Bounds are clamped so that `min >= 0` and `max >= min`; the result
 * is always an integer within the clamped interval.
 */
export function randomDelay(minMs: number, maxMs: number, rng: Random): number {
  const min = Math.max(0, Math.round(minMs));
  const max = Math.max(min, Math.round(maxMs));
  return randomInt(rng, min, max);
}

/** Brief pause between sub-steps of one action. */
export function shortPause(timing: TimingConfig, rng: Random): number {
  return randomDelay(
    Math.max(40, timing.minDelayMs / 6),
    Math.max(80, timing.minDelayMs / 4),
    rng,
  );
}

/** Longer pause standing in for reading or composing. */
export function thinkPause(timing: TimingConfig, rng: Random): number {
  const min = Math.max(timing.minDelayMs, 400);
  return randomDelay(min, Math.max(timing.maxDelayMs, min + 400), rng);
}

/** Dwell time between reaching an element and clicking it. */
export function hoverPause(rng: Random): number {
  return randomDelay(500, 1200, rng);
}

/**
 * Pause between two targets of a campaign.
 *
 * `floorMs` wins over a configured range that starts below it.
 */
export function pacingDelay(range: DelayRange, floorMs: number, rng: Random): number {
  const min = Math.max(range[0], floorMs);
  return randomDelay(min, Math.max(range[1], min), rng);
}
