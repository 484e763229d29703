// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { CampaignSummary } from "@steadyhand/core";

const STATUS_LABELS = {
  succeeded: "sent",
  failed: "failed",
  "skipped-ineligible": "ineligible",
  "skipped-duplicate": "duplicate",
  "skipped-quota": "over quota",
  pending: "not started",
} as const;

/** JSON shape of a finished connect or follow-up run. */
export function summaryJson(summary: CampaignSummary, rejected: readonly string[]) {
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

export function printSummary(summary: CampaignSummary, rejected: readonly string[]): void {
  const { counts } = summary;
  process.stdout.write(
    `${summary.workflow}: ${String(counts.succeeded)} sent, ${String(counts.failed)} failed, ` +
      `${String(counts.skippedIneligible)} ineligible, ${String(counts.skippedDuplicate)} duplicate, ` +
      `${String(counts.skippedQuota)} over quota, ${String(counts.pending)} not started\n`,
  );
  for (const outcome of summary.outcomes) {
    const label = STATUS_LABELS[outcome.status].padEnd(11);
    const reason = outcome.reason === undefined ? "" : ` (${outcome.reason})`;
    process.stdout.write(`  ${label} ${outcome.target}${reason}\n`);
  }
  if (summary.quotaExhausted) {
    process.stdout.write(`Daily quota reached (${String(summary.state.countToday)} today).\n`);
  }
  if (summary.cancelled) {
    process.stdout.write("Stopped before all targets were processed.\n");
  }
  if (rejected.length > 0) {
    process.stdout.write(`Ignored ${String(rejected.length)} input(s) that are not profiles: ${rejected.join(", ")}\n`);
  }
}
