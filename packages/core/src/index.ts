// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

export * from "./automation/index.js";
export * from "./campaign/index.js";
export * from "./cdp/index.js";
export * from "./config/index.js";
export { DEFAULT_CDP_PORT } from "./constants.js";
export {
  DeliveryError,
  ElementNotFoundError,
  InvalidInputError,
  isSystemicError,
  SteadyhandError,
  SystemicError,
  TargetError,
  TargetIneligibleError,
  VerificationError,
} from "./errors.js";
export * from "./humanize/index.js";
export * from "./locator/index.js";
export * from "./logging/index.js";
export * from "./navigation/index.js";
export * from "./operations/index.js";
export * from "./state/index.js";
export * from "./targets/index.js";
export * from "./utils/index.js";
export * from "./workflows/index.js";
