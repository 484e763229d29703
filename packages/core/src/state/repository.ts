// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import {
  type CampaignState,
  decodeSeen,
  decodeState,
  emptyState,
  encodeSeen,
  encodeState,
  type WorkflowKind,
} from "./campaign-state.js";
import type { StateStore } from "./store.js";

export const SEEN_TARGETS_KEY = "seen-targets";

export function stateKey(workflow: WorkflowKind): string {
  return `campaign-${workflow}`;
}

/**
 * Typed access to campaign records and the discovery seen-set on top of
 * a byte-oriented {@link StateStore}.
 */
export class CampaignStateRepository {
  constructor(readonly store: StateStore) {}

  /**
   * Stored record for `workflow`, or a fresh one for `today`. No
   * rollover is applied here.
   */
  async load(workflow: WorkflowKind, today: string): Promise<CampaignState> {
    const key = stateKey(workflow);
    const data = await this.store.load(key);
    return data === null ? emptyState(workflow, today) : decodeState(key, data, workflow);
  }

  async save(state: CampaignState): Promise<void> {
    await this.store.save(stateKey(state.workflow), encodeState(state));
  }

  async reset(workflow: WorkflowKind): Promise<void> {
    await this.store.delete(stateKey(workflow));
  }

  async loadSeen(): Promise<Set<string>> {
    const data = await this.store.load(SEEN_TARGETS_KEY);
    return data === null ? new Set() : decodeSeen(SEEN_TARGETS_KEY, data);
  }

  async saveSeen(seen: ReadonlySet<string>): Promise<void> {
    await this.store.save(SEEN_TARGETS_KEY, encodeSeen(seen));
  }

  async resetSeen(): Promise<void> {
    await this.store.delete(SEEN_TARGETS_KEY);
  }
}
