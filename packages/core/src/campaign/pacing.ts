// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { DelayRange } from "../humanize/timing.js";
import type { WorkflowKind } from "../state/campaign-state.js";

/** Minimum gap between two single-target actions. */
export const SINGLE_TARGET_FLOOR_MS = 5_000;

/** Page transitions are heavier than in-page actions. */
export const PAGINATION_FLOOR_FACTOR = 3;

/**
 * Lowest pacing each workflow accepts, whatever the configuration says.
 */
export const WORKFLOW_FLOORS_MS: Readonly<Record<WorkflowKind, number>> = {
  connect: SINGLE_TARGET_FLOOR_MS,
  "follow-up": 10_000,
  discovery: SINGLE_TARGET_FLOOR_MS * PAGINATION_FLOOR_FACTOR,
};

export interface PacingPolicy {
  /** Configured delay between targets (or result pages). */
  readonly range: DelayRange;
  /** Extra floor; the workflow's own floor applies regardless. */
  readonly floorMs?: number;
}

export function effectiveFloor(workflow: WorkflowKind, pacing: PacingPolicy): number {
  return Math.max(pacing.floorMs ?? 0, WORKFLOW_FLOORS_MS[workflow]);
}
