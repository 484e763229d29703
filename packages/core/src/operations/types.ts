// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { Config } from "../config/config.js";
import type { Logger } from "../logging/logger.js";

/**
 * Connection options shared by all operations that attach to the
 * signed-in browser via CDP. Unset fields fall back to the configuration.
 */
export interface ConnectionOptions {
  readonly cdpPort?: number | undefined;
  readonly cdpHost?: string | undefined;
  readonly allowRemote?: boolean | undefined;
}

/**
 * Input shared by every operation that drives a campaign.
 */
export interface RunInput extends ConnectionOptions {
  readonly config: Config;
  /** Stops the run between targets. */
  readonly signal?: AbortSignal | undefined;
  readonly logger?: Logger | undefined;
}
