// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { HumanActor } from "../automation/actor.js";
import { type BrowserConnectionOptions, withBrowserSession } from "../automation/session.js";
import { CampaignEngine } from "../campaign/engine.js";
import { type Config, typingOptions } from "../config/config.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import { ElementLocator } from "../locator/locator.js";
import { loadRoleCatalogue } from "../locator/roles.js";
import { FileStateStore } from "../state/file-store.js";
import { CampaignStateRepository } from "../state/repository.js";
import { systemRandom } from "../utils/random.js";
import type { WorkflowDeps } from "../workflows/types.js";
import type { ConnectionOptions, RunInput } from "./types.js";

/**
 * Everything a run needs once the browser is attached.
 */
export interface CampaignRuntime {
  readonly deps: WorkflowDeps;
  readonly engine: CampaignEngine;
  readonly logger: Logger;
}

/** Connection settings with explicit options taking precedence. */
export function resolveConnection(config: Config, options: ConnectionOptions): BrowserConnectionOptions {
  return {
    cdpPort: options.cdpPort ?? config.browser.cdpPort,
    cdpHost: options.cdpHost ?? config.browser.cdpHost,
    allowRemote: options.allowRemote ?? config.browser.allowRemote,
    navigationTimeoutMs: config.browser.navigationTimeoutMs,
  };
}

export function createRepository(config: Config): CampaignStateRepository {
  return new CampaignStateRepository(new FileStateStore(config.storage.dir));
}

/**
 * Attach to the browser, wire the actor, locator and engine from the
 * configuration, and run `callback`. The session is closed afterwards,
 * whatever the outcome.
 */
export async function withCampaignRuntime<T>(
  input: RunInput,
  callback: (runtime: CampaignRuntime) => Promise<T>,
): Promise<T> {
  const { config } = input;
  const logger = input.logger ?? silentLogger;
  const catalogue = loadRoleCatalogue(config.locator.rolesFile);
  const repository = createRepository(config);
  const connection = resolveConnection(config, input);

  return withBrowserSession(connection, async ({ context }) => {
    const actor = new HumanActor(context, {
      rng: systemRandom,
      timing: config.timing,
      motion: config.motion,
      typing: typingOptions(config),
      logger,
    });
    const locator = new ElementLocator(context, catalogue, {
      strategyTimeoutMs: config.locator.strategyTimeoutMs,
      indicatorTimeoutMs: config.locator.indicatorTimeoutMs,
      logger,
    });
    const engine = new CampaignEngine({ repository, rng: systemRandom, logger });
    return callback({
      deps: { context, actor, locator, navigationTimeoutMs: config.browser.navigationTimeoutMs },
      engine,
      logger,
    });
  });
}
