// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

export { handleBrowse } from "./browse.js";
export { handleCampaignReset } from "./campaign-reset.js";
export { handleCampaignStatus } from "./campaign-status.js";
export { handleCheckBrowser } from "./check-browser.js";
export { handleConnect } from "./connect.js";
export { handleDiscover } from "./discover.js";
export { handleFollowUp } from "./follow-up.js";
