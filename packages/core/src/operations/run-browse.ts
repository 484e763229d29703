// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { Config } from "../config/config.js";
import { InvalidInputError } from "../errors.js";
import { loadTourCatalogue, type TabName } from "../navigation/tours.js";
import { runTour, type TourSummary } from "../workflows/browse.js";
import { withCampaignRuntime } from "./runtime.js";
import type { RunInput } from "./types.js";

export interface RunBrowseInput extends RunInput {
  /** Defaults to `browse.tour`. */
  readonly tour?: string | undefined;
}

export type RunBrowseOutput = TourSummary;

export interface TourListing {
  readonly name: string;
  readonly description: string;
  readonly tabs: readonly TabName[];
}

/**
 * Idle through the site's main tabs along a named tour, e.g. to warm a
 * session up before outreach. Nothing is persisted.
 *
 * This is the shared business logic used by both the CLI handler and
 * the MCP tool.
 */
export async function runBrowse(input: RunBrowseInput): Promise<RunBrowseOutput> {
  const { config } = input;
  const catalogue = loadTourCatalogue(config.browse.toursFile);
  const requested = input.tour?.trim();
  const name = requested === undefined || requested === "" ? config.browse.tour : requested;
  const tour = catalogue.get(name);
  if (tour === undefined) {
    const known = catalogue.list().map((t) => t.name);
    throw new InvalidInputError(`Unknown tour "${name}" (available: ${known.join(", ")})`);
  }

  return withCampaignRuntime(input, ({ deps, logger }) =>
    runTour(deps, tour, { signal: input.signal, logger: logger.child({ tour: tour.name }) }),
  );
}

/** Tours `runBrowse` accepts under `config`. */
export function listTours(input: { readonly config: Config }): TourListing[] {
  return loadTourCatalogue(input.config.browse.toursFile)
    .list()
    .map(({ name, description, steps }) => ({ name, description, tabs: steps.map((s) => s.tab) }));
}
