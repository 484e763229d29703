// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { listTours, type RunBrowseOutput, runBrowse, type TourListing } from "@steadyhand/core";

import {
  type CommonOptions,
  commandLogger,
  connectionOptions,
  loadCommandConfig,
  reportError,
  withStopSignal,
  writeJson,
} from "./shared.js";

export async function handleBrowse(
  tour: string | undefined,
  options: CommonOptions & {
    /** Print the available tours instead of running one. */
    list?: boolean;
  },
): Promise<void> {
  const config = loadCommandConfig(options);
  if (config === null) return;

  if (options.list) {
    let tours: TourListing[];
    try {
      tours = listTours({ config });
    } catch (error) {
      reportError(error);
      return;
    }
    if (options.json) {
      writeJson(tours);
      return;
    }
    for (const entry of tours) {
      const suffix = entry.name === config.browse.tour ? " (default)" : "";
      process.stdout.write(`${entry.name}${suffix}: ${entry.tabs.join(" > ")}\n`);
      if (entry.description !== "") {
        process.stdout.write(`  ${entry.description}\n`);
      }
    }
    return;
  }

  let result: RunBrowseOutput;
  try {
    result = await withStopSignal((signal) =>
      runBrowse({
        config,
        ...(tour !== undefined && { tour }),
        ...connectionOptions(options),
        signal,
        logger: commandLogger(config),
      }),
    );
  } catch (error) {
    reportError(error);
    return;
  }

  if (options.json) {
    writeJson(result);
    return;
  }

  const visited = result.visited.length;
  process.stdout.write(
    `Tour "${result.tour}" ${result.stopReason === "cancelled" ? "stopped on request" : "finished"}: ` +
      `visited ${String(visited)} tab${visited === 1 ? "" : "s"}` +
      (result.failed.length > 0 ? `, ${String(result.failed.length)} failed` : "") +
      ".\n",
  );
  for (const visit of result.visited) {
    process.stdout.write(`  ${visit.tab} (${visit.via})\n`);
  }
  for (const failure of result.failed) {
    process.stdout.write(`  ${failure.tab}: ${failure.reason}\n`);
  }
}
