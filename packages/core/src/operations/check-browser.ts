// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { assertHostAllowed } from "../automation/session.js";
import { discoverTargets, pageTargets } from "../cdp/discovery.js";
import type { Config } from "../config/config.js";
import { resolveConnection } from "./runtime.js";
import type { ConnectionOptions } from "./types.js";

export interface CheckBrowserInput extends ConnectionOptions {
  readonly config: Config;
}

export interface BrowserPage {
  readonly id: string;
  readonly title: string;
  readonly url: string;
}

export interface CheckBrowserOutput {
  readonly endpoint: string;
  readonly pages: readonly BrowserPage[];
}

/**
 * Confirm the browser's debugging endpoint answers and list the tabs a
 * run could attach to. Does not attach.
 */
export async function checkBrowser(input: CheckBrowserInput): Promise<CheckBrowserOutput> {
  const { cdpPort, cdpHost, allowRemote } = resolveConnection(input.config, input);
  const host = cdpHost ?? input.config.browser.cdpHost;
  assertHostAllowed(host, allowRemote);

  const targets = await discoverTargets(cdpPort, host);
  return {
    endpoint: `http://${host}:${String(cdpPort)}`,
    pages: pageTargets(targets).map(({ id, title, url }) => ({ id, title, url })),
  };
}
