// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { InvalidStateKeyError } from "./errors.js";

/**
 * Durable key/value storage for campaign records.
 */
export interface StateStore {
  save(key: string, data: Uint8Array): Promise<void>;
  /** Stored bytes, or `null` when the key has never been written. */
  load(key: string): Promise<Uint8Array | null>;
  /** Removing a missing key is not an error. */
  delete(key: string): Promise<void>;
}

const KEY_PATTERN = /^[A-Za-z0-9._-]+$/;

/**
 * @throws {InvalidStateKeyError} for keys with path separators or other
 *   characters outside `[A-Za-z0-9._-]`, and for `.` / `..`.
 */
export function assertValidKey(key: string): void {
  if (!KEY_PATTERN.test(key) || key === "." || key === "..") {
    throw new InvalidStateKeyError(key);
  }
}
