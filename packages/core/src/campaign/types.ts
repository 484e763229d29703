// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { Logger } from "../logging/logger.js";
import type { CampaignState, WorkflowKind } from "../state/campaign-state.js";

export type TargetStatus =
  | "succeeded"
  | "failed"
  | "skipped-ineligible"
  | "skipped-duplicate"
  | "skipped-quota"
  | "pending";

export interface TargetOutcome {
  readonly target: string;
  readonly status: TargetStatus;
  /** Failure message or ineligibility reason. */
  readonly reason?: string;
}

export interface CampaignCounts {
  succeeded: number;
  failed: number;
  skippedIneligible: number;
  skippedDuplicate: number;
  skippedQuota: number;
  pending: number;
}

export interface CampaignSummary {
  readonly workflow: WorkflowKind;
  readonly counts: CampaignCounts;
  readonly outcomes: readonly TargetOutcome[];
  /** The quota stopped the run (at entry or part-way through). */
  readonly quotaExhausted: boolean;
  /** A stop signal ended the run before every target was considered. */
  readonly cancelled: boolean;
  readonly state: CampaignState;
}

export interface StepContext {
  readonly index: number;
  readonly logger: Logger;
}

/**
 * Acts on one target. Resolves on success; throws
 * `TargetIneligibleError` to skip, a `SystemicError` to abort the run,
 * anything else to record a failure.
 */
export type StepFunction = (target: string, context: StepContext) => Promise<void>;

/** One page of discovery results. */
export interface DiscoveryPage {
  /** Raw profile references found on the page, in page order. */
  readonly candidates: readonly string[];
  readonly hasNext: boolean;
}

export type PageFunction = (pageNumber: number, context: StepContext) => Promise<DiscoveryPage>;

export type DiscoveryStopReason =
  | "exhausted"
  | "last-page"
  | "max-pages"
  | "quota"
  | "cancelled"
  | "page-failed";

export interface DiscoverySummary {
  readonly query: string;
  readonly pagesVisited: number;
  /** New targets recorded in this run, in discovery order. */
  readonly discovered: readonly string[];
  /** Candidates skipped because an earlier run had already seen them. */
  readonly duplicates: number;
  readonly stopReason: DiscoveryStopReason;
  readonly state: CampaignState;
}
