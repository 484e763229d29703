// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { CampaignSummary } from "@steadyhand/core";
import { z } from "zod";

/** Profile list accepted by the outreach tools. */
export const targetsSchema = z
  .array(z.string())
  .nonempty()
  .describe("Profile URLs or /in/<handle>/ paths, in processing order");

export const quotaSchema = z
  .number()
  .int()
  .nonnegative()
  .optional();

/** JSON payload of a finished connect or follow-up run. */
export function summaryPayload(summary: CampaignSummary, rejected: readonly string[]) {
  return {
    workflow: summary.workflow,
    counts: summary.counts,
    outcomes: summary.outcomes,
    quotaExhausted: summary.quotaExhausted,
    cancelled: summary.cancelled,
    countToday: summary.state.countToday,
    rejected,
  };
}
