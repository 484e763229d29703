// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { chance, type Random, randomInt, uniform } from "../utils/random.js";
import { randomDelay } from "./timing.js";

export interface Point {
  readonly x: number;
  readonly y: number;
}

/** Viewport rectangle of an element. */
export interface Box {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/**
 * One pointer position to dispatch, after waiting `delayMs`.
 */
export interface MotionPoint extends Point {
  readonly delayMs: number;
}

export interface MotionOptions {
  /** Maximum perpendicular control-point offset, as a fraction of distance. */
  readonly curvature: number;
  /** Per-point noise in pixels. */
  readonly jitterPx: number;
  /** Probability of aiming past the target and correcting back. */
  readonly overshootProbability: number;
  readonly minStepDelayMs: number;
  readonly maxStepDelayMs: number;
}

export const DEFAULT_MOTION_OPTIONS: MotionOptions = {
  curvature: 0.1,
  jitterPx: 3,
  overshootProbability: 0.22,
  minStepDelayMs: 4,
  maxStepDelayMs: 16,
};

const DIRECT_MOVE_DISTANCE = 2;
const MIN_OVERSHOOT_DISTANCE = 40;
const MIN_STEPS = 25;
const MAX_STEPS = 150;

/**
 * Generate a pointer trajectory from `from` to `to`.
 *
 * The path is a cubic Bézier with control points pushed off the straight
 * line, sampled with per-point jitter and an ease-in/ease-out delay
 * profile. Some paths overshoot and come back with a few correction
 * points. The result is never empty and its last point is exactly `to`.
 */
export function generatePath(
  from: Point,
  to: Point,
  rng: Random,
  options: MotionOptions = DEFAULT_MOTION_OPTIONS,
): MotionPoint[] {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const distance = Math.hypot(dx, dy);

  if (distance < DIRECT_MOVE_DISTANCE) {
    return [
      {
        x: to.x,
        y: to.y,
        delayMs: randomDelay(options.minStepDelayMs, options.maxStepDelayMs, rng),
      },
    ];
  }

  const ux = dx / distance;
  const uy = dy / distance;
  const overshoot =
    distance > MIN_OVERSHOOT_DISTANCE && chance(rng, options.overshootProbability);
  const past = overshoot ? uniform(rng, 4, 14) : 0;
  const aim: Point = { x: to.x + ux * past, y: to.y + uy * past };

  const c1 = controlPoint(from, aim, 0.3, distance, ux, uy, rng, options.curvature);
  const c2 = controlPoint(from, aim, 0.7, distance, ux, uy, rng, options.curvature);

  const steps = clamp(Math.round(distance / 8) + 20, MIN_STEPS, MAX_STEPS);
  const points: MotionPoint[] = [];

  for (let i = 1; i < steps; i++) {
    const t = i / steps;
    const p = bezier(from, c1, c2, aim, t);
    points.push({
      x: p.x + uniform(rng, -options.jitterPx, options.jitterPx),
      y: p.y + uniform(rng, -options.jitterPx, options.jitterPx),
      delayMs: stepDelay(t, rng, options),
    });
  }

  if (!overshoot) {
    points.push({ x: to.x, y: to.y, delayMs: stepDelay(1, rng, options) });
    return points;
  }

  points.push({ x: aim.x, y: aim.y, delayMs: stepDelay(1, rng, options) });

  const corrections = randomInt(rng, 3, 5);
  for (let j = 1; j < corrections; j++) {
    const t = easeInOut(j / corrections);
    points.push({
      x: aim.x + (to.x - aim.x) * t + uniform(rng, -1, 1),
      y: aim.y + (to.y - aim.y) * t + uniform(rng, -1, 1),
      delayMs: correctionDelay(rng, options),
    });
  }
  points.push({ x: to.x, y: to.y, delayMs: correctionDelay(rng, options) });

  return points;
}

/**
 * Plausible pointer origin when the real position is unknown: a few
 * pixels up and left of the element's top-left corner.
 */
export function approximateStart(box: Box, rng: Random): Point {
  return {
    x: Math.max(0, box.x - uniform(rng, 8, 24)),
    y: Math.max(0, box.y - uniform(rng, 8, 24)),
  };
}

/**
 * Click point inside the central 60% of an element.
 */
export function pointInBox(box: Box, rng: Random): Point {
  return {
    x: box.x + box.width * uniform(rng, 0.2, 0.8),
    y: box.y + box.height * uniform(rng, 0.2, 0.8),
  };
}

function controlPoint(
  from: Point,
  to: Point,
  at: number,
  distance: number,
  ux: number,
  uy: number,
  rng: Random,
  curvature: number,
): Point {
  const offset = uniform(rng, -curvature, curvature) * distance;
  const wobble = uniform(rng, -0.05, 0.05) * distance;
  return {
    x: from.x + (to.x - from.x) * at - uy * offset + ux * wobble,
    y: from.y + (to.y - from.y) * at + ux * offset + uy * wobble,
  };
}

function bezier(p0: Point, p1: Point, p2: Point, p3: Point, t: number): Point {
  const mt = 1 - t;
  const a = mt * mt * mt;
  const b = 3 * mt * mt * t;
  const c = 3 * mt * t * t;
  const d = t * t * t;
  return {
    x: a * p0.x + b * p1.x + c * p2.x + d * p3.x,
    y: a * p0.y + b * p1.y + c * p2.y + d * p3.y,
  };
}

// Fast in the middle of the path, slow at both ends.
function stepDelay(t: number, rng: Random, options: MotionOptions): number {
  const span = options.maxStepDelayMs - options.minStepDelayMs;
  const base = options.minStepDelayMs + span * (1 - Math.sin(Math.PI * t));
  return Math.max(0, Math.round(base * uniform(rng, 0.8, 1.2)));
}

function correctionDelay(rng: Random, options: MotionOptions): number {
  return randomDelay(options.maxStepDelayMs, options.maxStepDelayMs * 2, rng);
}

function easeInOut(t: number): number {
  return t < 0.5 ? 2 * t * t : 1 - Math.pow(-2 * t + 2, 2) / 2;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
