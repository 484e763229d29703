// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { CdpTarget } from "./types.js";
import { CDPConnectionError } from "./errors.js";

/**
 * Default host used for CDP target discovery.
 */
export const DEFAULT_CDP_HOST = "127.0.0.1";

/**
 * Discover Chrome DevTools Protocol targets exposed at the given port.
 *
 * Fetches the `/json/list` HTTP endpoint that Chromium-based browsers
 * expose when started with `--remote-debugging-port`.
 *
 * @param port  - CDP debugging port (e.g. 9222).
 * @param host  - Host to connect to (default `127.0.0.1`).
 * @throws {CDPConnectionError} When the endpoint is unreachable or answers
 *   with something other than a target list.
 */
export async function discoverTargets(
  port: number,
  host: string = DEFAULT_CDP_HOST,
): Promise<CdpTarget[]> {
  const url = `http://${host}:${String(port)}/json/list`;

  let response: Response;
  try {
    response = await fetch(url);
  } catch (error) {
    throw new CDPConnectionError(
      `Failed to discover CDP targets at ${url}: browser not running or remote debugging not enabled`,
      { cause: error },
    );
  }

  if (!response.ok) {
    throw new CDPConnectionError(
      `CDP target discovery returned HTTP ${response.status.toString()} at ${url}`,
    );
  }

  const body: unknown = await response.json();
  if (!Array.isArray(body)) {
    throw new CDPConnectionError(`CDP target discovery at ${url} did not return a list`);
  }
  return body.filter(isCdpTarget);
}

/**
 * Page targets a session can attach to (skips DevTools windows, workers
 * and extension pages).
 */
export function pageTargets(targets: readonly CdpTarget[]): CdpTarget[] {
  return targets.filter(
    (t) => t.type === "page" && !t.url.startsWith("devtools://") && !t.url.startsWith("chrome-extension://"),
  );
}

function isCdpTarget(value: unknown): value is CdpTarget {
  if (value === null || typeof value !== "object") {
    return false;
  }
  return (
    "id" in value &&
    typeof value.id === "string" &&
    "title" in value &&
    typeof value.title === "string" &&
    "type" in value &&
    typeof value.type === "string" &&
    "url" in value &&
    typeof value.url === "string"
  );
}
