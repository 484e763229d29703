// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

export {
  type Config,
  CONFIG_PATH_ENV,
  configSchema,
  dailyQuota,
  DEFAULT_CONFIG_FILE,
  loadConfig,
  type LoadConfigOptions,
  LOG_LEVEL_ENV,
  parseConfig,
  typingOptions,
} from "./config.js";
export { ConfigError } from "./errors.js";
