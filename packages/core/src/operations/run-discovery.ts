// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { DiscoverySummary } from "../campaign/types.js";
import { InvalidInputError } from "../errors.js";
import { createDiscoveryPage } from "../workflows/discovery.js";
import { withCampaignRuntime } from "./runtime.js";
import type { RunInput } from "./types.js";

export interface RunDiscoveryInput extends RunInput {
  readonly query: string;
  /** Defaults to `discovery.maxPages`. */
  readonly maxPages?: number | undefined;
  /** Defaults to `limits.discovery`. */
  readonly quota?: number | undefined;
}

export type RunDiscoveryOutput = DiscoverySummary;

/**
 * Search for people matching `query` and record new profiles for later
 * outreach.
 *
 * This is the shared business logic used by both the CLI handler and
 * the MCP tool.
 */
export async function runDiscovery(input: RunDiscoveryInput): Promise<RunDiscoveryOutput> {
  const query = input.query.trim();
  if (query === "") {
    throw new InvalidInputError("Search query must not be empty");
  }
  const { config } = input;

  return withCampaignRuntime(input, ({ deps, engine }) =>
    engine.discover({
      query,
      maxPages: input.maxPages ?? config.discovery.maxPages,
      quota: input.quota ?? config.limits.discovery,
      page: createDiscoveryPage(deps, query),
      pacing: { range: config.pacing.discovery },
      signal: input.signal,
    }),
  );
}
