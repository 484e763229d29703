// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { AutomationContext, ElementHandle } from "../automation/types.js";
import { ElementNotFoundError, TargetIneligibleError, isSystemicError } from "../errors.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import { errorMessage } from "../utils/error-message.js";
import type { RoleCatalogue, RoleDefinition, Strategy } from "./roles.js";

/**
 * Outcome of resolving a role on the current page.
 */
export type LocateResult =
  | { readonly status: "found"; readonly handle: ElementHandle; readonly strategy: Strategy }
  | { readonly status: "unavailable"; readonly reason: string; readonly indicator: string }
  | { readonly status: "not-found"; readonly tried: readonly string[] };

export interface LocatorOptions {
  /** Per-strategy wait (default 3000ms). */
  readonly strategyTimeoutMs?: number;
  /** Per-indicator wait (default 2000ms). */
  readonly indicatorTimeoutMs?: number;
  readonly logger?: Logger;
}

const DEFAULT_STRATEGY_TIMEOUT = 3_000;
const DEFAULT_INDICATOR_TIMEOUT = 2_000;
const SEMANTIC_ATTRIBUTES = ["aria-label", "placeholder", "title"] as const;

/**
 * Resolves semantic roles to live elements with fallback strategies and
 * keyword validation.
 *
 * A failed lookup distinguishes "the page says this action is not
 * possible" (`unavailable`) from "nothing matched" (`not-found`).
 */
export class ElementLocator {
  private readonly strategyTimeoutMs: number;
  private readonly indicatorTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly context: AutomationContext,
    private readonly catalogue: RoleCatalogue,
    options: LocatorOptions = {},
  ) {
    this.strategyTimeoutMs = options.strategyTimeoutMs ?? DEFAULT_STRATEGY_TIMEOUT;
    this.indicatorTimeoutMs = options.indicatorTimeoutMs ?? DEFAULT_INDICATOR_TIMEOUT;
    this.logger = options.logger ?? silentLogger;
  }

  async resolve(role: string): Promise<LocateResult> {
    const definition = this.catalogue.get(role);

    const found = await this.firstValidated(definition, this.strategyTimeoutMs);
    if (found !== null) {
      return found;
    }

    for (const indicator of definition.unavailable) {
      const hit = await this.context.findBySelector(indicator.selector, {
        timeoutMs: this.indicatorTimeoutMs,
      });
      if (hit !== null) {
        this.logger.debug("role unavailable", { role, reason: indicator.reason });
        return { status: "unavailable", reason: indicator.reason, indicator: indicator.selector };
      }
    }

    return { status: "not-found", tried: definition.strategies.map((s) => s.selector) };
  }

  /**
   * Resolve a role that the current step cannot do without.
   *
   * @throws {TargetIneligibleError} when an unavailability indicator is present.
   * @throws {ElementNotFoundError} when nothing matched.
   */
  async require(role: string): Promise<ElementHandle> {
    const result = await this.resolve(role);
    switch (result.status) {
      case "found":
        return result.handle;
      case "unavailable":
        throw new TargetIneligibleError(role, result.reason);
      case "not-found":
        throw new ElementNotFoundError(role, result.tried);
    }
  }

  /**
   * Whether the role currently resolves, without checking unavailability indicators.
   */
  async present(role: string, timeoutMs?: number): Promise<boolean> {
    const definition = this.catalogue.get(role);
    return (await this.firstValidated(definition, timeoutMs ?? this.strategyTimeoutMs)) !== null;
  }

  /**
   * Every validated match across all strategies, in strategy order.
   * Does not wait; used for lists such as search results.
   */
  async collect(role: string): Promise<ElementHandle[]> {
    const definition = this.catalogue.get(role);
    const handles: ElementHandle[] = [];
    for (const strategy of definition.strategies) {
      for (const handle of await this.context.findAllBySelector(strategy.selector)) {
        if (await this.validates(handle, strategy, definition)) {
          handles.push(handle);
        }
      }
    }
    return handles;
  }

  private async firstValidated(
    definition: RoleDefinition,
    timeoutMs: number,
  ): Promise<Extract<LocateResult, { status: "found" }> | null> {
    for (const strategy of definition.strategies) {
      const handle = await this.context.findBySelector(strategy.selector, { timeoutMs });
      if (handle === null) {
        continue;
      }
      if (await this.validates(handle, strategy, definition)) {
        this.logger.debug("role resolved", {
          role: definition.role,
          kind: strategy.kind,
          selector: strategy.selector,
        });
        return { status: "found", handle, strategy };
      }
      this.logger.debug("match rejected by keyword check", {
        role: definition.role,
        selector: strategy.selector,
      });
    }
    return null;
  }

  private async validates(
    handle: ElementHandle,
    strategy: Strategy,
    definition: RoleDefinition,
  ): Promise<boolean> {
    if (strategy.validate === "none" || definition.keywords.length === 0) {
      return true;
    }
    try {
      return matchesKeywords(await semanticText(handle), definition.keywords);
    } catch (error) {
      if (isSystemicError(error)) {
        throw error;
      }
      // Stale element: treat as a non-match and try the next strategy.
      this.logger.debug("could not read candidate element", {
        role: definition.role,
        error: errorMessage(error),
      });
      return false;
    }
  }
}

/**
 * Case-insensitive "contains any keyword" check.
 */
export function matchesKeywords(texts: readonly string[], keywords: readonly string[]): boolean {
  const haystack = texts.map((t) => t.toLowerCase());
  return keywords.some((k) => {
    const needle = k.toLowerCase();
    return haystack.some((t) => t.includes(needle));
  });
}

async function semanticText(handle: ElementHandle): Promise<string[]> {
  const texts = [await handle.text()];
  for (const name of SEMANTIC_ATTRIBUTES) {
    const value = await handle.attribute(name);
    if (value !== null) {
      texts.push(value);
    }
  }
  return texts;
}
