// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { isSystemicError, TargetIneligibleError } from "../errors.js";
import { pacingDelay } from "../humanize/timing.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import {
  calendarDay,
  type CampaignState,
  rollover,
  type WorkflowKind,
} from "../state/campaign-state.js";
import type { CampaignStateRepository } from "../state/repository.js";
import { normalizeTarget } from "../targets/normalize.js";
import { delay, type Sleep } from "../utils/delay.js";
import { errorMessage } from "../utils/error-message.js";
import { type Random, systemRandom } from "../utils/random.js";
import { effectiveFloor, type PacingPolicy } from "./pacing.js";
import type {
  CampaignCounts,
  CampaignSummary,
  DiscoveryPage,
  DiscoveryStopReason,
  DiscoverySummary,
  PageFunction,
  StepFunction,
  TargetOutcome,
  TargetStatus,
} from "./types.js";

export interface CampaignEngineOptions {
  readonly repository: CampaignStateRepository;
  readonly rng?: Random;
  /** Receives the run's abort signal and must resolve early on abort. */
  readonly sleep?: Sleep;
  readonly clock?: () => Date;
  readonly logger?: Logger;
}

export interface CampaignRunOptions {
  readonly workflow: WorkflowKind;
  /** Canonical targets, processed in order. */
  readonly targets: readonly string[];
  /** Daily cap on completed actions. */
  readonly quota: number;
  readonly step: StepFunction;
  readonly pacing: PacingPolicy;
  readonly signal?: AbortSignal | undefined;
}

export interface DiscoveryRunOptions {
  readonly query: string;
  readonly maxPages: number;
  /** Daily cap on newly discovered targets. */
  readonly quota: number;
  readonly page: PageFunction;
  readonly pacing: PacingPolicy;
  readonly signal?: AbortSignal | undefined;
}

/**
 * Drives targets through a step function under a persistent daily quota.
 *
 * Per-target failures are recorded and the run continues; only systemic
 * failures escape. State is saved after every target, before the next
 * one starts.
 */
export class CampaignEngine {
  private readonly repository: CampaignStateRepository;
  private readonly rng: Random;
  private readonly sleep: Sleep;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: CampaignEngineOptions) {
    this.repository = options.repository;
    this.rng = options.rng ?? systemRandom;
    this.sleep = options.sleep ?? delay;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  async run(options: CampaignRunOptions): Promise<CampaignSummary> {
    const { workflow, targets, quota, signal } = options;
    const logger = this.logger.child({ workflow });
    const state = await this.loadState(workflow, logger);
    const floor = effectiveFloor(workflow, options.pacing);

    const outcomes: TargetOutcome[] = [];
    let quotaExhausted = false;
    let cancelled = false;

    const skipRest = (from: number, status: TargetStatus) => {
      for (const target of targets.slice(from)) {
        outcomes.push({ target, status });
      }
    };

    if (state.countToday >= quota) {
      logger.info("daily quota already reached", { countToday: state.countToday, quota });
      skipRest(0, "skipped-quota");
      return this.summarize(workflow, outcomes, true, false, state);
    }

    for (let index = 0; index < targets.length; index++) {
      const target = targets[index];
      if (target === undefined) break;

      if (signal?.aborted) {
        cancelled = true;
        skipRest(index, "pending");
        break;
      }

      if (state.attempted[target] === true) {
        logger.info("skipping duplicate target", { target });
        outcomes.push({ target, status: "skipped-duplicate" });
        continue;
      }

      if (state.countToday >= quota) {
        logger.info("daily quota reached", { countToday: state.countToday, quota });
        quotaExhausted = true;
        skipRest(index, "skipped-quota");
        break;
      }

      state.attempted[target] = true;
      const outcome = await this.attempt(state, target, index, options, logger);
      outcomes.push(outcome);
      await this.repository.save(state);

      if (index < targets.length - 1) {
        await this.sleep(pacingDelay(options.pacing.range, floor, this.rng), signal);
        if (signal?.aborted) {
          cancelled = true;
          skipRest(index + 1, "pending");
          break;
        }
      }
    }

    const summary = this.summarize(workflow, outcomes, quotaExhausted, cancelled, state);
    logger.info("campaign run finished", { ...summary.counts, quotaExhausted, cancelled });
    return summary;
  }

  /**
   * Page through search results, recording new targets until the quota,
   * the page limit or the results run out.
   */
  async discover(options: DiscoveryRunOptions): Promise<DiscoverySummary> {
    const { query, quota, signal } = options;
    const logger = this.logger.child({ workflow: "discovery", query });
    const state = await this.loadState("discovery", logger);
    const seen = await this.repository.loadSeen();
    const floor = effectiveFloor("discovery", options.pacing);

    const discovered: string[] = [];
    let duplicates = 0;
    let pagesVisited = 0;
    let stopReason: DiscoveryStopReason = "max-pages";

    for (let pageNumber = 1; pageNumber <= options.maxPages; pageNumber++) {
      if (signal?.aborted) {
        stopReason = "cancelled";
        break;
      }
      if (state.countToday >= quota) {
        stopReason = "quota";
        break;
      }

      let page: DiscoveryPage;
      try {
        page = await options.page(pageNumber, { index: pageNumber - 1, logger });
      } catch (error) {
        state.failed[`page:${String(pageNumber)}:${query}`] = errorMessage(error);
        await this.repository.save(state);
        if (isSystemicError(error)) {
          throw error;
        }
        logger.warn("result page failed", { page: pageNumber, error });
        stopReason = "page-failed";
        break;
      }
      pagesVisited++;

      const fresh: string[] = [];
      const onPage = new Set<string>();
      for (const raw of page.candidates) {
        const target = normalizeTarget(raw);
        if (target === null || onPage.has(target)) continue;
        onPage.add(target);
        if (seen.has(target)) {
          duplicates++;
          continue;
        }
        fresh.push(target);
      }

      const accepted = fresh.slice(0, Math.max(0, quota - state.countToday));
      const now = this.clock().toISOString();
      for (const target of accepted) {
        seen.add(target);
        state.attempted[target] = true;
        state.succeeded[target] = now;
        state.countToday++;
      }
      discovered.push(...accepted);

      await this.repository.saveSeen(seen);
      await this.repository.save(state);
      logger.info("result page processed", {
        page: pageNumber,
        candidates: page.candidates.length,
        new: accepted.length,
      });

      if (fresh.length === 0) {
        stopReason = "exhausted";
        break;
      }
      if (accepted.length < fresh.length) {
        stopReason = "quota";
        break;
      }
      if (!page.hasNext) {
        stopReason = "last-page";
        break;
      }
      if (pageNumber === options.maxPages) {
        break;
      }

      await this.sleep(pacingDelay(options.pacing.range, floor, this.rng), signal);
    }

    logger.info("discovery finished", { pagesVisited, discovered: discovered.length, stopReason });
    return { query, pagesVisited, discovered, duplicates, stopReason, state };
  }

  private async loadState(workflow: WorkflowKind, logger: Logger): Promise<CampaignState> {
    const today = calendarDay(this.clock());
    const state = await this.repository.load(workflow, today);
    if (rollover(state, today)) {
      logger.info("new day: daily counter reset", { epoch: today });
    }
    return state;
  }

  private async attempt(
    state: CampaignState,
    target: string,
    index: number,
    options: CampaignRunOptions,
    logger: Logger,
  ): Promise<TargetOutcome> {
    const targetLogger = logger.child({ target });
    try {
      await options.step(target, { index, logger: targetLogger });
    } catch (error) {
      if (error instanceof TargetIneligibleError) {
        state.ineligible[target] = error.reason;
        targetLogger.info("target ineligible", { reason: error.reason });
        return { target, status: "skipped-ineligible", reason: error.reason };
      }
      const reason = errorMessage(error);
      state.failed[target] = reason;
      if (isSystemicError(error)) {
        await this.repository.save(state);
        targetLogger.error("run aborted", { error: reason });
        throw error;
      }
      targetLogger.warn("target failed", { error: reason });
      return { target, status: "failed", reason };
    }

    state.countToday++;
    state.succeeded[target] = this.clock().toISOString();
    delete state.failed[target];
    targetLogger.info("target succeeded", { countToday: state.countToday });
    return { target, status: "succeeded" };
  }

  private summarize(
    workflow: WorkflowKind,
    outcomes: readonly TargetOutcome[],
    quotaExhausted: boolean,
    cancelled: boolean,
    state: CampaignState,
  ): CampaignSummary {
    return { workflow, counts: countOutcomes(outcomes), outcomes, quotaExhausted, cancelled, state };
  }
}

export function countOutcomes(outcomes: readonly TargetOutcome[]): CampaignCounts {
  const counts: CampaignCounts = {
    succeeded: 0,
    failed: 0,
    skippedIneligible: 0,
    skippedDuplicate: 0,
    skippedQuota: 0,
    pending: 0,
  };
  for (const { status } of outcomes) {
    switch (status) {
      case "succeeded":
        counts.succeeded++;
        break;
      case "failed":
        counts.failed++;
        break;
      case "skipped-ineligible":
        counts.skippedIneligible++;
        break;
      case "skipped-duplicate":
        counts.skippedDuplicate++;
        break;
      case "skipped-quota":
        counts.skippedQuota++;
        break;
      case "pending":
        counts.pending++;
        break;
    }
  }
  return counts;
}
