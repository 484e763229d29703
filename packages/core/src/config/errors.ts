// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { SteadyhandError } from "../errors.js";

/**
 * Thrown when a configuration or role catalogue file cannot be read or
 * fails validation.
 */
export class ConfigError extends SteadyhandError {
  readonly path: string | undefined;

  constructor(message: string, path?: string, options?: ErrorOptions) {
    super(path === undefined ? message : `${path}: ${message}`, options);
    this.name = "ConfigError";
    this.path = path;
  }
}
