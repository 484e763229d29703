// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { DeliveryError, TargetError, isSystemicError } from "../errors.js";
import {
  DEFAULT_TYPING_OPTIONS,
  planKeystrokes,
  type TypingOptions,
} from "../humanize/keystrokes.js";
import {
  approximateStart,
  DEFAULT_MOTION_OPTIONS,
  generatePath,
  type MotionOptions,
  type Point,
  pointInBox,
} from "../humanize/motion.js";
import {
  planReadingScroll,
  planSmoothScroll,
  type ScrollStep,
} from "../humanize/scroll.js";
import {
  type DelayRange,
  hoverPause,
  randomDelay,
  shortPause,
  thinkPause,
  type TimingConfig,
} from "../humanize/timing.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import { delay, type Sleep } from "../utils/delay.js";
import { errorMessage } from "../utils/error-message.js";
import { type Random, systemRandom } from "../utils/random.js";
import type { AutomationContext, ElementHandle } from "./types.js";

export const DEFAULT_TIMING: TimingConfig = { minDelayMs: 750, maxDelayMs: 2250 };

export interface HumanActorOptions {
  readonly rng?: Random;
  readonly timing?: TimingConfig;
  readonly motion?: MotionOptions;
  readonly typing?: TypingOptions;
  /** Never given an abort signal: a started action runs to completion. */
  readonly sleep?: Sleep;
  readonly logger?: Logger;
}

export type PauseKind = "short" | "think" | "hover";

/**
 * Replays generated pointer paths, keystroke plans and scroll gestures
 * against an {@link AutomationContext}.
 *
 * Remembers where the pointer was left so consecutive moves chain.
 */
export class HumanActor {
  readonly rng: Random;
  readonly timing: TimingConfig;
  private readonly motion: MotionOptions;
  private readonly typing: TypingOptions;
  private readonly sleep: Sleep;
  private readonly logger: Logger;
  private pointer: Point | null = null;

  constructor(
    private readonly context: AutomationContext,
    options: HumanActorOptions = {},
  ) {
    this.rng = options.rng ?? systemRandom;
    this.timing = options.timing ?? DEFAULT_TIMING;
    this.motion = options.motion ?? DEFAULT_MOTION_OPTIONS;
    this.typing = options.typing ?? DEFAULT_TYPING_OPTIONS;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.logger = options.logger ?? silentLogger;
  }

  /** Last dispatched pointer position, if any. */
  get pointerPosition(): Point | null {
    return this.pointer;
  }

  /**
   * Move the pointer onto `handle` along a generated path.
   *
   * @returns the point the pointer rests on, or `null` when the element
   *   has no box to aim at.
   */
  async moveTo(handle: ElementHandle): Promise<Point | null> {
    const box = await handle.boundingBox();
    if (box === null) {
      return null;
    }
    const target = pointInBox(box, this.rng);
    const from = this.pointer ?? approximateStart(box, this.rng);
    const path = generatePath(from, target, this.rng, this.motion);

    for (const point of path) {
      await this.sleep(point.delayMs);
      await this.context.moveMouse(point.x, point.y);
      this.pointer = { x: point.x, y: point.y };
    }
    this.logger.debug("pointer moved", { points: path.length });
    return target;
  }

  /**
   * Move onto the element, hover briefly, click. Elements without a box
   * fall back to a driver-level click.
   */
  async click(handle: ElementHandle): Promise<void> {
    const at = await this.moveTo(handle);
    await this.sleep(hoverPause(this.rng));
    if (at === null) {
      await handle.click();
      return;
    }
    await this.context.clickAt(at.x, at.y);
  }

  /**
   * Focus `handle` with a click and type `text` key by key.
   *
   * @throws {DeliveryError} when any key cannot be delivered; typing stops
   *   at the first failure.
   */
  async type(handle: ElementHandle, text: string): Promise<void> {
    await this.click(handle);
    await this.sleep(shortPause(this.timing, this.rng));

    const events = planKeystrokes(text, this.rng, this.typing);
    for (const event of events) {
      await this.sleep(event.delayMs);
      if (event.kind === "pause") continue;
      try {
        await this.context.sendRawKey(event.key);
      } catch (error) {
        if (error instanceof TargetError || isSystemicError(error)) {
          throw error;
        }
        throw new DeliveryError("type", errorMessage(error), { cause: error });
      }
    }
    this.logger.debug("typed text", { characters: Array.from(text).length, events: events.length });
  }

  /** Press a single named key (e.g. `Enter`) after a short pause. */
  async press(key: string): Promise<void> {
    await this.sleep(shortPause(this.timing, this.rng));
    try {
      await this.context.sendRawKey(key);
    } catch (error) {
      if (error instanceof TargetError || isSystemicError(error)) {
        throw error;
      }
      throw new DeliveryError(`press ${key}`, errorMessage(error), { cause: error });
    }
  }

  /** Replay scroll gestures, each as a burst of small wheel ticks. */
  async scroll(steps: readonly ScrollStep[]): Promise<void> {
    for (const step of steps) {
      for (const tick of planSmoothScroll(step.deltaY, this.rng)) {
        await this.sleep(tick.pauseMs);
        await this.context.scrollBy(0, tick.deltaY);
      }
      await this.sleep(step.pauseMs);
    }
  }

  /** Skim the current page the way a reader would. */
  async read(): Promise<void> {
    await this.scroll(planReadingScroll(this.timing, this.rng));
  }

  async pause(kind: PauseKind | DelayRange): Promise<void> {
    await this.sleep(this.pauseDuration(kind));
  }

  private pauseDuration(kind: PauseKind | DelayRange): number {
    switch (kind) {
      case "short":
        return shortPause(this.timing, this.rng);
      case "think":
        return thinkPause(this.timing, this.rng);
      case "hover":
        return hoverPause(this.rng);
      default:
        return randomDelay(kind[0], kind[1], this.rng);
    }
  }
}
