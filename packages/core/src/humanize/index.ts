// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

export {
  adjacentKeys,
  BACKSPACE,
  DEFAULT_TYPING_OPTIONS,
  type KeystrokeEvent,
  planKeystrokes,
  replayKeystrokes,
  SOFT_NEWLINE,
  type TypingOptions,
} from "./keystrokes.js";
export {
  approximateStart,
  type Box,
  DEFAULT_MOTION_OPTIONS,
  generatePath,
  type MotionOptions,
  type MotionPoint,
  type Point,
  pointInBox,
} from "./motion.js";
export {
  planFeedScroll,
  planReadingScroll,
  planResultsScroll,
  planSmoothScroll,
  type ScrollStep,
} from "./scroll.js";
export {
  type DelayRange,
  hoverPause,
  pacingDelay,
  randomDelay,
  shortPause,
  thinkPause,
  type TimingConfig,
} from "./timing.js";
