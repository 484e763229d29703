// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { campaignReset, type WorkflowKind } from "@steadyhand/core";

import { type CommonOptions, loadCommandConfig, reportError, writeJson } from "./shared.js";

export async function handleCampaignReset(
  workflow: WorkflowKind,
  options: Pick<CommonOptions, "config" | "json"> & { includeSeen?: boolean },
): Promise<void> {
  const config = loadCommandConfig(options);
  if (config === null) return;

  try {
    const result = await campaignReset({
      workflow,
      config,
      ...(options.includeSeen !== undefined && { includeSeen: options.includeSeen }),
    });
    if (options.json) {
      writeJson({ success: true, ...result });
    } else {
      process.stdout.write(
        `Reset ${workflow} record${result.seenCleared ? " and seen profiles" : ""}.\n`,
      );
    }
  } catch (error) {
    reportError(error);
  }
}
