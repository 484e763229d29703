// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

export { DEFAULT_TIMING, HumanActor, type HumanActorOptions, type PauseKind } from "./actor.js";
export { AutomationUnavailableError, RemoteHostRefusedError } from "./errors.js";
export { isClosedTargetError, PlaywrightAutomationContext } from "./playwright-context.js";
export {
  assertHostAllowed,
  type BrowserConnectionOptions,
  type BrowserSession,
  connectBrowser,
  withBrowserSession,
} from "./session.js";
export type { AutomationContext, ElementHandle, WaitOptions } from "./types.js";
