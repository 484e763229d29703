// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { ElementHandle } from "../automation/types.js";
import type { PageFunction } from "../campaign/types.js";
import type { Logger } from "../logging/logger.js";
import { ROLES } from "../locator/roles.js";
import { planResultsScroll } from "../humanize/scroll.js";
import { PROFILE_ORIGIN, searchUrl } from "../targets/normalize.js";
import { navigationTimeout, openPage } from "./profile.js";
import type { WorkflowDeps } from "./types.js";

export const FEED_URL = `${PROFILE_ORIGIN}/feed/`;

const PEOPLE_RESULTS_PATH = "/search/results/people";

/**
 * Page function for a people search.
 *
 * Page 1 is reached by typing the query the way a member would; later
 * pages follow the "next" control when the previous page is still
 * showing, otherwise they are loaded by URL.
 */
export function createDiscoveryPage(deps: WorkflowDeps, query: string): PageFunction {
  const { actor, context, locator } = deps;
  let showing = 0;

  return async (pageNumber, { logger }) => {
    if (pageNumber === 1) {
      await openSearch(deps, query, logger);
    } else if (showing !== pageNumber - 1 || !(await followNext(deps))) {
      logger.debug("loading result page by URL", { page: pageNumber });
      await openPage(deps, searchUrl(query, pageNumber));
    }
    showing = pageNumber;

    await actor.scroll(planResultsScroll(actor.timing, actor.rng));

    const candidates: string[] = [];
    for (const link of await locator.collect(ROLES.resultLink)) {
      const href = await link.attribute("href");
      if (href !== null) {
        candidates.push(href);
      }
    }

    const next = await locator.resolve(ROLES.nextPage);
    const hasNext = next.status === "found" && (await isEnabled(next.handle));
    logger.debug("result page read", { page: pageNumber, links: candidates.length, hasNext, url: context.currentURL() });
    return { candidates, hasNext };
  };
}

async function openSearch(deps: WorkflowDeps, query: string, logger: Logger): Promise<void> {
  const { actor, context, locator } = deps;
  const current = context.currentURL();
  if (!current.startsWith(`${PROFILE_ORIGIN}/feed`) && !current.startsWith(`${PROFILE_ORIGIN}/search`)) {
    await openPage(deps, FEED_URL);
  }

  const input = await locator.resolve(ROLES.searchInput);
  if (input.status !== "found") {
    logger.info("search box not found; loading results by URL");
    await openPage(deps, searchUrl(query));
    return;
  }

  await actor.type(input.handle, query);
  await actor.press("Enter");
  await context.waitLoaded({ timeoutMs: navigationTimeout(deps) });

  if (new URL(context.currentURL()).pathname.startsWith(PEOPLE_RESULTS_PATH)) {
    return;
  }
  const filter = await locator.resolve(ROLES.peopleFilter);
  if (filter.status === "found") {
    await actor.click(filter.handle);
    await context.waitLoaded({ timeoutMs: navigationTimeout(deps) });
  } else {
    logger.info("people filter not found; loading results by URL");
    await openPage(deps, searchUrl(query));
  }
}

async function followNext(deps: WorkflowDeps): Promise<boolean> {
  const next = await deps.locator.resolve(ROLES.nextPage);
  if (next.status !== "found" || !(await isEnabled(next.handle))) {
    return false;
  }
  await deps.actor.click(next.handle);
  await deps.context.waitLoaded({ timeoutMs: navigationTimeout(deps) });
  return true;
}

async function isEnabled(handle: ElementHandle): Promise<boolean> {
  if ((await handle.attribute("disabled")) !== null) {
    return false;
  }
  return (await handle.attribute("aria-disabled")) !== "true";
}
