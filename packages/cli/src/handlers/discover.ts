// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { writeFileSync } from "node:fs";

import { type RunDiscoveryOutput, runDiscovery } from "@steadyhand/core";

import {
  type CommonOptions,
  commandLogger,
  connectionOptions,
  loadCommandConfig,
  reportError,
  withStopSignal,
  writeJson,
} from "./shared.js";

const STOP_REASONS: Record<RunDiscoveryOutput["stopReason"], string> = {
  exhausted: "no new profiles on the last page",
  "last-page": "reached the last result page",
  "max-pages": "page limit reached",
  quota: "daily discovery quota reached",
  cancelled: "stopped on request",
  "page-failed": "a result page failed to load",
};

export async function handleDiscover(
  query: string,
  options: CommonOptions & {
    maxPages?: number;
    quota?: number;
    /** File receiving one discovered profile URL per line. */
    output?: string;
  },
): Promise<void> {
  const config = loadCommandConfig(options);
  if (config === null) return;

  let result: RunDiscoveryOutput;
  try {
    result = await withStopSignal((signal) =>
      runDiscovery({
        config,
        query,
        ...connectionOptions(options),
        ...(options.maxPages !== undefined && { maxPages: options.maxPages }),
        ...(options.quota !== undefined && { quota: options.quota }),
        signal,
        logger: commandLogger(config),
      }),
    );
  } catch (error) {
    reportError(error);
    return;
  }

  if (options.output !== undefined) {
    try {
      writeFileSync(options.output, result.discovered.map((url) => `${url}\n`).join(""));
    } catch (error) {
      reportError(error);
      return;
    }
  }

  if (options.json) {
    writeJson({
      query: result.query,
      pagesVisited: result.pagesVisited,
      discovered: result.discovered,
      duplicates: result.duplicates,
      stopReason: result.stopReason,
      countToday: result.state.countToday,
    });
    return;
  }

  process.stdout.write(
    `Discovered ${String(result.discovered.length)} new profile${result.discovered.length === 1 ? "" : "s"} ` +
      `for "${result.query}" across ${String(result.pagesVisited)} page${result.pagesVisited === 1 ? "" : "s"} ` +
      `(${String(result.duplicates)} already seen; ${STOP_REASONS[result.stopReason]}).\n`,
  );
  for (const url of result.discovered) {
    process.stdout.write(`  ${url}\n`);
  }
}
