// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { type Config, dailyQuota } from "../config/config.js";
import { calendarDay, rollover, type WorkflowKind } from "../state/campaign-state.js";
import { createRepository } from "./runtime.js";

export interface CampaignStatusInput {
  readonly workflow: WorkflowKind;
  readonly config: Config;
  readonly clock?: (() => Date) | undefined;
}

export interface CampaignStatusOutput {
  readonly workflow: WorkflowKind;
  /** Day the counter refers to (today, once rolled over). */
  readonly epoch: string;
  readonly countToday: number;
  readonly quota: number;
  readonly remainingToday: number;
  readonly attempted: number;
  readonly succeeded: number;
  /** Target → last failure reason. */
  readonly failed: Readonly<Record<string, string>>;
  /** Target → why it was skipped. */
  readonly ineligible: Readonly<Record<string, string>>;
  /** Size of the discovery seen-set; discovery only. */
  readonly seen?: number;
}

/**
 * Summarise the persisted record of a workflow as of today. Reading does
 * not modify the record.
 */
export async function campaignStatus(input: CampaignStatusInput): Promise<CampaignStatusOutput> {
  const { workflow, config } = input;
  const repository = createRepository(config);
  const today = calendarDay((input.clock ?? (() => new Date()))());

  const state = await repository.load(workflow, today);
  rollover(state, today);
  const quota = dailyQuota(config, workflow);

  const output: CampaignStatusOutput = {
    workflow,
    epoch: state.epoch,
    countToday: state.countToday,
    quota,
    remainingToday: Math.max(0, quota - state.countToday),
    attempted: Object.keys(state.attempted).length,
    succeeded: Object.keys(state.succeeded).length,
    failed: state.failed,
    ineligible: state.ineligible,
  };

  if (workflow === "discovery") {
    return { ...output, seen: (await repository.loadSeen()).size };
  }
  return output;
}
