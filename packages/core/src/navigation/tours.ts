// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { readFileSync } from "node:fs";

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { ConfigError } from "../config/errors.js";
import { ROLES, type RoleName } from "../locator/roles.js";
import { PROFILE_ORIGIN } from "../targets/normalize.js";
import { errorMessage } from "../utils/error-message.js";
import bundledCatalogue from "./tours.json" with { type: "json" };

export const TAB_NAMES = ["feed", "my-network", "jobs", "messaging", "notifications"] as const;

export type TabName = (typeof TAB_NAMES)[number];

export interface TabDefinition {
  /** Path prefix of the tab's pages. */
  readonly path: string;
  /** Role of the tab's link in the global navigation bar. */
  readonly role: RoleName;
}

export const TABS: Readonly<Record<TabName, TabDefinition>> = {
  feed: { path: "/feed", role: ROLES.navFeed },
  "my-network": { path: "/mynetwork", role: ROLES.navMyNetwork },
  jobs: { path: "/jobs", role: ROLES.navJobs },
  messaging: { path: "/messaging", role: ROLES.navMessaging },
  notifications: { path: "/notifications", role: ROLES.navNotifications },
};

export function tabUrl(tab: TabName): string {
  return `${PROFILE_ORIGIN}${TABS[tab].path}/`;
}

/** Whether `url` shows one of `tab`'s pages. */
export function isOnTab(url: string, tab: TabName): boolean {
  const parsed = new URL(url);
  const path = TABS[tab].path;
  return (
    parsed.origin === PROFILE_ORIGIN &&
    (parsed.pathname === path || parsed.pathname.startsWith(`${path}/`))
  );
}

const millis = z.number().int().nonnegative();

const stepSchema = z.object({
  tab: z.enum(TAB_NAMES),
  /** Omitted: skim the page once. Zero: no scrolling. */
  scrollMs: millis.optional(),
  /** Omitted: a randomized pause derived from the timing config. */
  pauseAfterMs: millis.optional(),
});

const tourSchema = z.object({
  description: z.string().default(""),
  steps: z.array(stepSchema).min(1),
});

const catalogueSchema = z.object({
  version: z.literal(1),
  tours: z.record(z.string().min(1), tourSchema),
});

export type TourStep = z.infer<typeof stepSchema>;

/**
 * A named walk through the site's main tabs.
 */
export interface TourDefinition extends z.infer<typeof tourSchema> {
  readonly name: string;
}

export class TourCatalogue {
  private readonly tours: ReadonlyMap<string, TourDefinition>;

  constructor(definitions: readonly TourDefinition[]) {
    this.tours = new Map(definitions.map((d) => [d.name, d]));
  }

  get(name: string): TourDefinition | undefined {
    return this.tours.get(name);
  }

  list(): TourDefinition[] {
    return [...this.tours.values()];
  }
}

/**
 * Validate a parsed tour catalogue document.
 *
 * @throws {ConfigError} naming the first offending path.
 */
export function parseTourCatalogue(doc: unknown, source?: string): TourCatalogue {
  const result = catalogueSchema.safeParse(doc);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue === undefined ? "" : issue.path.join(".");
    throw new ConfigError(
      `Invalid tour catalogue${where === "" ? "" : ` at "${where}"`}: ${issue?.message ?? "unknown error"}`,
      source,
    );
  }
  return new TourCatalogue(
    Object.entries(result.data.tours).map(([name, definition]) => ({ name, ...definition })),
  );
}

/**
 * Load tours from a YAML or JSON file, or the bundled set when no path
 * is given.
 */
export function loadTourCatalogue(path?: string): TourCatalogue {
  if (path === undefined) {
    return parseTourCatalogue(bundledCatalogue, "tours.json");
  }
  let doc: unknown;
  try {
    doc = parseYaml(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Cannot read tour catalogue: ${errorMessage(error)}`, path, { cause: error });
  }
  return parseTourCatalogue(doc, path);
}
