// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

export { delay, type Sleep } from "./delay.js";
export { errorMessage } from "./error-message.js";
export { isLoopbackAddress } from "./loopback.js";
export {
  firstName,
  personalize,
  type PersonalizeOptions,
  type TemplateValues,
  truncate,
} from "./message-template.js";
export { isNotFound } from "./not-found.js";
export {
  chance,
  createSeededRandom,
  pick,
  type Random,
  randomInt,
  systemRandom,
  uniform,
} from "./random.js";
