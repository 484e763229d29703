// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

export {
  openTab,
  runTour,
  type TabArrival,
  type TabFailure,
  type TabVisit,
  type TourOptions,
  type TourSummary,
} from "./browse.js";
export { type ConnectStepOptions, createConnectStep, NOTE_MAX_LENGTH } from "./connect.js";
export { createDiscoveryPage, FEED_URL } from "./discovery.js";
export { createFollowUpStep, MESSAGE_MAX_LENGTH } from "./follow-up.js";
export {
  DEFAULT_NAVIGATION_TIMEOUT_MS,
  openPage,
  openProfile,
  readFirstName,
} from "./profile.js";
export type { MessageTemplate, WorkflowDeps } from "./types.js";
