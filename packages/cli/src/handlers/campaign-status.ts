// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { campaignStatus, type CampaignStatusOutput, type WorkflowKind } from "@steadyhand/core";

import { type CommonOptions, loadCommandConfig, reportError, writeJson } from "./shared.js";

export async function handleCampaignStatus(
  workflow: WorkflowKind,
  options: Pick<CommonOptions, "config" | "json">,
): Promise<void> {
  const config = loadCommandConfig(options);
  if (config === null) return;

  let status: CampaignStatusOutput;
  try {
    status = await campaignStatus({ workflow, config });
  } catch (error) {
    reportError(error);
    return;
  }

  if (options.json) {
    writeJson(status);
    return;
  }

  process.stdout.write(`Workflow: ${status.workflow}\n`);
  process.stdout.write(
    `Today (${status.epoch}): ${String(status.countToday)} of ${String(status.quota)} ` +
      `(${String(status.remainingToday)} remaining)\n`,
  );
  process.stdout.write(`Attempted: ${String(status.attempted)}\n`);
  process.stdout.write(`Succeeded: ${String(status.succeeded)}\n`);
  if (status.seen !== undefined) {
    process.stdout.write(`Seen profiles: ${String(status.seen)}\n`);
  }
  printReasons("Failed", status.failed);
  printReasons("Ineligible", status.ineligible);
}

function printReasons(title: string, entries: Readonly<Record<string, string>>): void {
  const list = Object.entries(entries);
  if (list.length === 0) return;
  process.stdout.write(`\n${title} (${String(list.length)}):\n`);
  for (const [target, reason] of list) {
    process.stdout.write(`  ${target}: ${reason}\n`);
  }
}
