// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { checkBrowser } from "@steadyhand/core";

import {
  type CommonOptions,
  connectionOptions,
  loadCommandConfig,
  reportError,
  writeJson,
} from "./shared.js";

export async function handleCheckBrowser(options: CommonOptions): Promise<void> {
  const config = loadCommandConfig(options);
  if (config === null) return;

  try {
    const result = await checkBrowser({ config, ...connectionOptions(options) });
    if (options.json) {
      writeJson(result);
      return;
    }
    process.stdout.write(`Browser reachable at ${result.endpoint}\n`);
    if (result.pages.length === 0) {
      process.stdout.write("No open tabs; a run will open one.\n");
      return;
    }
    process.stdout.write(`\nTabs (${String(result.pages.length)}):\n`);
    for (const page of result.pages) {
      process.stdout.write(`  ${page.title || "(untitled)"}  ${page.url}\n`);
    }
  } catch (error) {
    reportError(error);
  }
}
