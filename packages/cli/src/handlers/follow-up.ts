// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { type RunFollowUpOutput, runFollowUp } from "@steadyhand/core";

import {
  type CommonOptions,
  commandLogger,
  connectionOptions,
  loadCommandConfig,
  reportError,
  withStopSignal,
  writeJson,
} from "./shared.js";
import { printSummary, summaryJson } from "./summary.js";
import { collectTargets } from "./targets.js";

export async function handleFollowUp(
  options: CommonOptions & {
    targets?: string;
    targetsFile?: string;
    quota?: number;
  },
): Promise<void> {
  const targets = collectTargets(options);
  if (targets === null) return;
  const config = loadCommandConfig(options);
  if (config === null) return;

  let result: RunFollowUpOutput;
  try {
    result = await withStopSignal((signal) =>
      runFollowUp({
        config,
        targets,
        ...connectionOptions(options),
        ...(options.quota !== undefined && { quota: options.quota }),
        signal,
        logger: commandLogger(config),
      }),
    );
  } catch (error) {
    reportError(error);
    return;
  }

  if (options.json) {
    writeJson(summaryJson(result, result.rejected));
  } else {
    printSummary(result, result.rejected);
  }
}
