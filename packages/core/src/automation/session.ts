// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { type Browser, chromium } from "playwright-core";

import { DEFAULT_CDP_HOST, discoverTargets, pageTargets } from "../cdp/discovery.js";
import { CDPConnectionError } from "../cdp/errors.js";
import type { CdpTarget } from "../cdp/types.js";
import { errorMessage } from "../utils/error-message.js";
import { isLoopbackAddress } from "../utils/loopback.js";
import { RemoteHostRefusedError } from "./errors.js";
import { PlaywrightAutomationContext } from "./playwright-context.js";
import type { AutomationContext } from "./types.js";

export interface BrowserConnectionOptions {
  readonly cdpPort: number;
  readonly cdpHost?: string | undefined;
  readonly allowRemote?: boolean | undefined;
  readonly navigationTimeoutMs?: number | undefined;
}

/**
 * An attached browser tab plus the means to detach from it.
 */
export interface BrowserSession {
  readonly context: AutomationContext;
  /** Page targets listed by the debugging endpoint at attach time. */
  readonly targets: readonly CdpTarget[];
  close(): Promise<void>;
}

/**
 * Attach to an already running, already signed-in Chromium through its
 * remote debugging port and pick the first regular tab (or open one).
 *
 * @throws {RemoteHostRefusedError} for a non-loopback host without
 *   `allowRemote`.
 * @throws {CDPConnectionError} when the endpoint is unreachable or the
 *   browser cannot be attached.
 */
export async function connectBrowser(
  options: BrowserConnectionOptions,
): Promise<BrowserSession> {
  const host = options.cdpHost ?? DEFAULT_CDP_HOST;
  assertHostAllowed(host, options.allowRemote);

  const targets = pageTargets(await discoverTargets(options.cdpPort, host));
  const endpoint = `http://${host}:${String(options.cdpPort)}`;

  let browser: Browser;
  try {
    browser = await chromium.connectOverCDP(endpoint);
  } catch (error) {
    throw new CDPConnectionError(
      `Failed to attach to browser at ${endpoint}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  try {
    const browserContext = browser.contexts()[0];
    if (browserContext === undefined) {
      throw new CDPConnectionError(`Browser at ${endpoint} exposes no browsing context`);
    }
    const page =
      browserContext.pages().find((p) => !p.url().startsWith("devtools://")) ??
      (await browserContext.newPage());

    return {
      context: new PlaywrightAutomationContext(page, {
        ...(options.navigationTimeoutMs !== undefined && {
          navigationTimeoutMs: options.navigationTimeoutMs,
        }),
      }),
      targets,
      close: () => browser.close(),
    };
  } catch (error) {
    await browser.close();
    throw error;
  }
}

/**
 * @throws {RemoteHostRefusedError} for a non-loopback host unless
 *   `allowRemote` is set.
 */
export function assertHostAllowed(host: string, allowRemote: boolean | undefined): void {
  if (allowRemote !== true && !isLoopbackAddress(host)) {
    throw new RemoteHostRefusedError(host);
  }
}

/**
 * Attach to the browser for the duration of `callback`.
 *
 * The connection is closed when the callback finishes (whether it
 * resolves or rejects).
 */
export async function withBrowserSession<T>(
  options: BrowserConnectionOptions,
  callback: (session: BrowserSession) => T | Promise<T>,
): Promise<T> {
  const session = await connectBrowser(options);
  try {
    return await callback(session);
  } finally {
    await session.close();
  }
}
