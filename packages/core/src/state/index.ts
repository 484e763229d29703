// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

export {
  calendarDay,
  type CampaignState,
  CURRENT_STATE_VERSION,
  decodeSeen,
  decodeState,
  emptyState,
  encodeSeen,
  encodeState,
  rollover,
  WORKFLOW_KINDS,
  type WorkflowKind,
} from "./campaign-state.js";
export { CampaignStateFormatError, InvalidStateKeyError, StateStoreError } from "./errors.js";
export { DEFAULT_STATE_DIR, FileStateStore } from "./file-store.js";
export { MemoryStateStore } from "./memory-store.js";
export { CampaignStateRepository, SEEN_TARGETS_KEY, stateKey } from "./repository.js";
export { assertValidKey, type StateStore } from "./store.js";
