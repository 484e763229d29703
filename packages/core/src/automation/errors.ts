// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { SystemicError } from "../errors.js";

/**
 * Thrown when the browser, page or debugging connection is gone. Nothing
 * further can be done in this run.
 */
export class AutomationUnavailableError extends SystemicError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AutomationUnavailableError";
  }
}

/**
 * Thrown when a non-loopback CDP host is requested without
 * `allowRemote`.
 */
export class RemoteHostRefusedError extends SystemicError {
  readonly host: string;

  constructor(host: string) {
    super(
      `Refusing to attach to non-loopback CDP host "${host}"; pass allowRemote to override`,
    );
    this.name = "RemoteHostRefusedError";
    this.host = host;
  }
}
