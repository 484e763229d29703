// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { Box } from "../humanize/motion.js";

/**
 * A live element on the page.
 *
 * Handles may go stale when the page re-renders; methods then reject.
 */
export interface ElementHandle {
  /** Visible text, or the current value for form fields. */
  text(): Promise<string>;
  attribute(name: string): Promise<string | null>;
  /** Viewport rectangle, or `null` when the element is not rendered. */
  boundingBox(): Promise<Box | null>;
  /** Driver-level click, used when no coordinates are available. */
  click(): Promise<void>;
}

export interface WaitOptions {
  readonly timeoutMs?: number;
}

/**
 * Capability the campaign engine drives. Implemented over a real browser
 * in `PlaywrightAutomationContext` and in memory by `FakeAutomationContext`.
 */
export interface AutomationContext {
  navigate(url: string, options?: WaitOptions): Promise<void>;
  waitLoaded(options?: WaitOptions): Promise<void>;
  currentURL(): string;
  /** First visible match, or `null` once the timeout elapses. */
  findBySelector(selector: string, options?: WaitOptions): Promise<ElementHandle | null>;
  /** All current matches, without waiting. */
  findAllBySelector(selector: string): Promise<ElementHandle[]>;
  moveMouse(x: number, y: number): Promise<void>;
  clickAt(x: number, y: number): Promise<void>;
  /** One printable character or a named key such as `Enter`. */
  sendRawKey(key: string): Promise<void>;
  scrollBy(deltaX: number, deltaY: number): Promise<void>;
}
