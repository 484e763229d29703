// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

export {
  campaignReset,
  type CampaignResetInput,
  type CampaignResetOutput,
} from "./campaign-reset.js";
export {
  campaignStatus,
  type CampaignStatusInput,
  type CampaignStatusOutput,
} from "./campaign-status.js";
export {
  type BrowserPage,
  checkBrowser,
  type CheckBrowserInput,
  type CheckBrowserOutput,
} from "./check-browser.js";
export {
  listTours,
  runBrowse,
  type RunBrowseInput,
  type RunBrowseOutput,
  type TourListing,
} from "./run-browse.js";
export { runConnect, type RunConnectInput, type RunConnectOutput } from "./run-connect.js";
export {
  runDiscovery,
  type RunDiscoveryInput,
  type RunDiscoveryOutput,
} from "./run-discovery.js";
export { runFollowUp, type RunFollowUpInput, type RunFollowUpOutput } from "./run-follow-up.js";
export {
  type CampaignRuntime,
  createRepository,
  resolveConnection,
  withCampaignRuntime,
} from "./runtime.js";
export { requireTargets } from "./targets.js";
export type { ConnectionOptions, RunInput } from "./types.js";
