// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { HumanActor } from "../automation/actor.js";
import type { AutomationContext } from "../automation/types.js";
import type { ElementLocator } from "../locator/locator.js";

/**
 * What every workflow step is composed from.
 */
export interface WorkflowDeps {
  readonly context: AutomationContext;
  readonly actor: HumanActor;
  readonly locator: ElementLocator;
  /** Per-navigation wait (default 30000ms). */
  readonly navigationTimeoutMs?: number;
}

/** Placeholder values shared by notes and messages. */
export interface MessageTemplate {
  readonly template: string;
  /** Substituted for `{{context}}`. */
  readonly context?: string;
}
