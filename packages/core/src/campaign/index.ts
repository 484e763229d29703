// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

export {
  CampaignEngine,
  type CampaignEngineOptions,
  type CampaignRunOptions,
  countOutcomes,
  type DiscoveryRunOptions,
} from "./engine.js";
export {
  effectiveFloor,
  PAGINATION_FLOOR_FACTOR,
  type PacingPolicy,
  SINGLE_TARGET_FLOOR_MS,
  WORKFLOW_FLOORS_MS,
} from "./pacing.js";
export type {
  CampaignCounts,
  CampaignSummary,
  DiscoveryPage,
  DiscoveryStopReason,
  DiscoverySummary,
  PageFunction,
  StepContext,
  StepFunction,
  TargetOutcome,
  TargetStatus,
} from "./types.js";
