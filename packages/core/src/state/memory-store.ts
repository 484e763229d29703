// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { assertValidKey, type StateStore } from "./store.js";

/**
 * In-process {@link StateStore}. Stores copies, so callers cannot mutate
 * persisted bytes after the fact.
 */
export class MemoryStateStore implements StateStore {
  private readonly entries = new Map<string, Uint8Array>();
  /** Number of successful saves, per key. */
  readonly saves = new Map<string, number>();

  async save(key: string, data: Uint8Array): Promise<void> {
    assertValidKey(key);
    this.entries.set(key, new Uint8Array(data));
    this.saves.set(key, (this.saves.get(key) ?? 0) + 1);
  }

  async load(key: string): Promise<Uint8Array | null> {
    assertValidKey(key);
    const data = this.entries.get(key);
    return data === undefined ? null : new Uint8Array(data);
  }

  async delete(key: string): Promise<void> {
    assertValidKey(key);
    this.entries.delete(key);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}
