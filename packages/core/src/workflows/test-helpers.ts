// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { HumanActor } from "../automation/actor.js";
import type { StepContext } from "../campaign/types.js";
import { silentLogger } from "../logging/logger.js";
import { ElementLocator } from "../locator/locator.js";
import { loadRoleCatalogue } from "../locator/roles.js";
import { FakeAutomationContext, recordingSleep } from "../testing/index.js";
import { createSeededRandom } from "../utils/random.js";
import type { WorkflowDeps } from "./types.js";

export const STEP: StepContext = { index: 0, logger: silentLogger };

export function createDeps(seed = 7): {
  context: FakeAutomationContext;
  deps: WorkflowDeps;
  calls: number[];
} {
  const context = new FakeAutomationContext();
  const { sleep, calls } = recordingSleep();
  const actor = new HumanActor(context, { rng: createSeededRandom(seed), sleep });
  const locator = new ElementLocator(context, loadRoleCatalogue());
  return { context, deps: { context, actor, locator }, calls };
}
