// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { DeliveryError, isSystemicError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { ROLES } from "../locator/roles.js";
import { errorMessage } from "../utils/error-message.js";
import { firstName } from "../utils/message-template.js";
import type { WorkflowDeps } from "./types.js";

export const DEFAULT_NAVIGATION_TIMEOUT_MS = 30_000;

export function navigationTimeout(deps: WorkflowDeps): number {
  return deps.navigationTimeoutMs ?? DEFAULT_NAVIGATION_TIMEOUT_MS;
}

/**
 * Load `url` and wait until it settles.
 */
export async function openPage(deps: WorkflowDeps, url: string): Promise<void> {
  const timeoutMs = navigationTimeout(deps);
  await deps.context.navigate(url, { timeoutMs });
  await deps.context.waitLoaded({ timeoutMs });
}

/**
 * Open a profile and make sure it rendered.
 *
 * @throws {DeliveryError} when no profile header shows up.
 */
export async function openProfile(deps: WorkflowDeps, target: string): Promise<void> {
  await openPage(deps, target);
  if (!(await deps.locator.present(ROLES.profileHeader))) {
    throw new DeliveryError("open profile", "profile unavailable or private");
  }
}

/**
 * First name shown on the open profile, if it can be read.
 */
export async function readFirstName(deps: WorkflowDeps, logger: Logger): Promise<string | undefined> {
  const result = await deps.locator.resolve(ROLES.profileName);
  if (result.status !== "found") {
    logger.debug("profile name not found");
    return undefined;
  }
  try {
    const name = firstName(await result.handle.text());
    return name === "" ? undefined : name;
  } catch (error) {
    if (isSystemicError(error)) {
      throw error;
    }
    logger.debug("could not read profile name", { error: errorMessage(error) });
    return undefined;
  }
}
