// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import {
  errors,
  type ElementHandle as PlaywrightElementHandle,
  type Page,
} from "playwright-core";

import { DeliveryError } from "../errors.js";
import type { Box } from "../humanize/motion.js";
import { errorMessage } from "../utils/error-message.js";
import { AutomationUnavailableError } from "./errors.js";
import type { AutomationContext, ElementHandle, WaitOptions } from "./types.js";

const DEFAULT_NAVIGATION_TIMEOUT = 30_000;
const DEFAULT_FIND_TIMEOUT = 3_000;

const CLOSED_PATTERN = /target (page, context or browser )?(has been )?closed|browser has been closed|browser closed/i;

/**
 * Whether a driver error means the page or browser is gone.
 */
export function isClosedTargetError(error: unknown): boolean {
  return error instanceof Error && CLOSED_PATTERN.test(error.message);
}

/**
 * {@link AutomationContext} over a Playwright page attached through CDP.
 *
 * Driver timeouts on lookups become `null`; on actions they become
 * {@link DeliveryError}. A closed page is an
 * {@link AutomationUnavailableError}.
 */
export class PlaywrightAutomationContext implements AutomationContext {
  constructor(
    private readonly page: Page,
    private readonly options: { readonly navigationTimeoutMs?: number } = {},
  ) {}

  async navigate(url: string, options?: WaitOptions): Promise<void> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch (error) {
      throw new DeliveryError("navigate", `invalid URL "${url}"`, { cause: error });
    }
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      throw new DeliveryError(
        "navigate",
        `unsupported URL scheme "${parsed.protocol}" (only http and https are allowed)`,
      );
    }
    await this.guard("navigate", async () => {
      await this.page.goto(url, {
        timeout: options?.timeoutMs ?? this.navigationTimeout,
        waitUntil: "domcontentloaded",
      });
    });
  }

  async waitLoaded(options?: WaitOptions): Promise<void> {
    await this.guard("wait for page load", async () => {
      await this.page.waitForLoadState("load", {
        timeout: options?.timeoutMs ?? this.navigationTimeout,
      });
    });
  }

  currentURL(): string {
    return this.page.url();
  }

  async findBySelector(selector: string, options?: WaitOptions): Promise<ElementHandle | null> {
    this.ensureOpen();
    try {
      const handle = await this.page.waitForSelector(selector, {
        state: "visible",
        timeout: options?.timeoutMs ?? DEFAULT_FIND_TIMEOUT,
      });
      return handle === null ? null : new PlaywrightElement(handle, this.guard);
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        return null;
      }
      throw this.translate("find element", error);
    }
  }

  async findAllBySelector(selector: string): Promise<ElementHandle[]> {
    const handles = await this.guard("find elements", () => this.page.$$(selector));
    return handles.map((handle) => new PlaywrightElement(handle, this.guard));
  }

  async moveMouse(x: number, y: number): Promise<void> {
    await this.guard("move pointer", () => this.page.mouse.move(x, y));
  }

  async clickAt(x: number, y: number): Promise<void> {
    await this.guard("click", () => this.page.mouse.click(x, y));
  }

  async sendRawKey(key: string): Promise<void> {
    await this.guard(`send key ${key}`, () =>
      Array.from(key).length === 1
        ? this.page.keyboard.type(key)
        : this.page.keyboard.press(key),
    );
  }

  async scrollBy(deltaX: number, deltaY: number): Promise<void> {
    await this.guard("scroll", () => this.page.mouse.wheel(deltaX, deltaY));
  }

  private get navigationTimeout(): number {
    return this.options.navigationTimeoutMs ?? DEFAULT_NAVIGATION_TIMEOUT;
  }

  private ensureOpen(): void {
    if (this.page.isClosed()) {
      throw new AutomationUnavailableError("Browser page has been closed");
    }
  }

  private readonly guard: Guard = async (action, fn) => {
    this.ensureOpen();
    try {
      return await fn();
    } catch (error) {
      throw this.translate(action, error);
    }
  };

  private translate(action: string, error: unknown): Error {
    if (isClosedTargetError(error) || this.page.isClosed()) {
      return new AutomationUnavailableError(
        `Browser went away during "${action}": ${errorMessage(error)}`,
        { cause: error },
      );
    }
    return new DeliveryError(action, errorMessage(error), { cause: error });
  }
}

type Guard = <T>(action: string, fn: () => Promise<T>) => Promise<T>;

/** Element calls share the page's closed-target and failure mapping. */
class PlaywrightElement implements ElementHandle {
  constructor(
    private readonly handle: PlaywrightElementHandle<SVGElement | HTMLElement>,
    private readonly guard: Guard,
  ) {}

  async text(): Promise<string> {
    return this.guard("read element text", async () => {
      const tag = String(await (await this.handle.getProperty("tagName")).jsonValue());
      if (tag === "INPUT" || tag === "TEXTAREA") {
        return this.handle.inputValue();
      }
      return this.handle.innerText();
    });
  }

  async attribute(name: string): Promise<string | null> {
    return this.guard(`read attribute ${name}`, () => this.handle.getAttribute(name));
  }

  async boundingBox(): Promise<Box | null> {
    return this.guard("measure element", () => this.handle.boundingBox());
  }

  async click(): Promise<void> {
    await this.guard("click element", () => this.handle.click());
  }
}
