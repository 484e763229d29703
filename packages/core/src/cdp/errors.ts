// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { SystemicError } from "../errors.js";

/**
 * Base class for all CDP-related errors. The debugging endpoint is a
 * precondition for every run, so these abort it.
 */
export class CDPError extends SystemicError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CDPError";
  }
}

/**
 * Thrown when the debugging endpoint cannot be reached or the browser
 * cannot be attached.
 */
export class CDPConnectionError extends CDPError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CDPConnectionError";
  }
}
