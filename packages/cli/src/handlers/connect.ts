// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { type RunConnectOutput, runConnect } from "@steadyhand/core";

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

export async function handleConnect(
  options: CommonOptions & {
    targets?: string;
    targetsFile?: string;
    quota?: number;
    /** `false` with `--no-note`. */
    note?: boolean;
  },
): Promise<void> {
  const targets = collectTargets(options);
  if (targets === null) return;
  const config = loadCommandConfig(options);
  if (config === null) return;

  let result: RunConnectOutput;
  try {
    result = await withStopSignal((signal) =>
      runConnect({
        config,
        targets,
        ...connectionOptions(options),
        ...(options.quota !== undefined && { quota: options.quota }),
        ...(options.note === false && { note: false }),
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
