// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { DeliveryError, isSystemicError } from "../errors.js";
import { planFeedScroll } from "../humanize/scroll.js";
import type { DelayRange } from "../humanize/timing.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import {
  isOnTab,
  type TabName,
  TABS,
  tabUrl,
  type TourDefinition,
  type TourStep,
} from "../navigation/tours.js";
import { errorMessage } from "../utils/error-message.js";
import { navigationTimeout, openPage } from "./profile.js";
import type { WorkflowDeps } from "./types.js";

/** How a tab was reached. */
export type TabArrival = "click" | "url" | "already-open";

export interface TabVisit {
  readonly tab: TabName;
  readonly via: TabArrival;
  readonly scrolled: boolean;
}

export interface TabFailure {
  readonly tab: TabName;
  readonly reason: string;
}

export interface TourSummary {
  readonly tour: string;
  readonly visited: readonly TabVisit[];
  readonly failed: readonly TabFailure[];
  readonly stopReason: "completed" | "cancelled";
}

export interface TourOptions {
  /** Checked before each tab, after the pause that precedes it. */
  readonly signal?: AbortSignal | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Walk through `tour`'s tabs the way a member idles on the site: follow
 * the navigation bar where it can be found, scroll for the step's time,
 * then pause before the next tab.
 *
 * A tab that fails to open is logged and skipped.
 *
 * @throws {DeliveryError} when no tab could be opened at all.
 */
export async function runTour(
  deps: WorkflowDeps,
  tour: TourDefinition,
  options: TourOptions = {},
): Promise<TourSummary> {
  const logger = options.logger ?? silentLogger;
  const visited: TabVisit[] = [];
  const failed: TabFailure[] = [];
  let stopReason: TourSummary["stopReason"] = "completed";

  logger.info("tour started", { tour: tour.name, steps: tour.steps.length });
  for (const [index, step] of tour.steps.entries()) {
    const previous = tour.steps[index - 1];
    if (previous !== undefined) {
      await deps.actor.pause(pauseAfter(deps, previous));
    }
    if (options.signal?.aborted) {
      stopReason = "cancelled";
      break;
    }

    let via: TabArrival;
    try {
      via = await openTab(deps, step.tab, logger);
    } catch (error) {
      if (isSystemicError(error)) {
        throw error;
      }
      logger.warn("tab failed to open; moving on", { tab: step.tab, error: errorMessage(error) });
      failed.push({ tab: step.tab, reason: errorMessage(error) });
      continue;
    }

    const scrolled = await browseTab(deps, step, logger);
    visited.push({ tab: step.tab, via, scrolled });
    logger.debug("tab visited", { step: index + 1, tab: step.tab, via, scrolled });
  }

  if (visited.length === 0 && failed.length > 0) {
    throw new DeliveryError("browse", `no tab of tour "${tour.name}" could be opened`);
  }
  logger.info("tour finished", { tour: tour.name, visited: visited.length, failed: failed.length, stopReason });
  return { tour: tour.name, visited, failed, stopReason };
}

/**
 * Bring `tab` up: nothing to do when it is already showing, a click on
 * its navigation link when there is one, its URL otherwise.
 */
export async function openTab(deps: WorkflowDeps, tab: TabName, logger: Logger): Promise<TabArrival> {
  const { actor, context, locator } = deps;
  if (isOnTab(context.currentURL(), tab)) {
    return "already-open";
  }

  const link = await locator.resolve(TABS[tab].role);
  if (link.status === "found") {
    try {
      await actor.click(link.handle);
      await context.waitLoaded({ timeoutMs: navigationTimeout(deps) });
      if (isOnTab(context.currentURL(), tab)) {
        return "click";
      }
      logger.debug("tab click did not navigate; loading by URL", { tab, url: context.currentURL() });
    } catch (error) {
      if (isSystemicError(error)) {
        throw error;
      }
      logger.debug("tab click failed; loading by URL", { tab, error: errorMessage(error) });
    }
  } else {
    logger.debug("navigation link not found; loading by URL", { tab });
  }

  await openPage(deps, tabUrl(tab));
  return "url";
}

async function browseTab(deps: WorkflowDeps, step: TourStep, logger: Logger): Promise<boolean> {
  const { actor } = deps;
  if (step.scrollMs === 0) {
    return false;
  }
  try {
    if (step.scrollMs === undefined) {
      await actor.read();
    } else {
      await actor.scroll(planFeedScroll(step.scrollMs, actor.timing, actor.rng));
    }
    return true;
  } catch (error) {
    if (isSystemicError(error)) {
      throw error;
    }
    logger.warn("scrolling failed", { tab: step.tab, error: errorMessage(error) });
    return false;
  }
}

function pauseAfter(deps: WorkflowDeps, step: TourStep): DelayRange {
  if (step.pauseAfterMs !== undefined) {
    return [step.pauseAfterMs, step.pauseAfterMs];
  }
  const { minDelayMs, maxDelayMs } = deps.actor.timing;
  return [Math.max(2000, minDelayMs * 2), Math.max(5000, maxDelayMs * 2)];
}
