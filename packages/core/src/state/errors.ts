// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { SteadyhandError, SystemicError } from "../errors.js";

/**
 * Thrown when the backing store cannot be read or written.
 */
export class StateStoreError extends SystemicError {
  readonly key: string;

  constructor(key: string, message: string, options?: ErrorOptions) {
    super(`State store failure for "${key}": ${message}`, options);
    this.name = "StateStoreError";
    this.key = key;
  }
}

/**
 * Thrown when a persisted record cannot be decoded or carries a schema
 * version this build does not understand.
 */
export class CampaignStateFormatError extends SystemicError {
  readonly key: string;

  constructor(key: string, message: string, options?: ErrorOptions) {
    super(`Unreadable state record "${key}": ${message}`, options);
    this.name = "CampaignStateFormatError";
    this.key = key;
  }
}

/**
 * Thrown for keys that would not map to a single file name.
 */
export class InvalidStateKeyError extends SteadyhandError {
  readonly key: string;

  constructor(key: string) {
    super(`Invalid state key "${key}": use letters, digits, ".", "_" or "-"`);
    this.name = "InvalidStateKeyError";
    this.key = key;
  }
}
