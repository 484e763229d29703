// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { registerBrowse } from "./browse.js";
import { registerCampaignReset } from "./campaign-reset.js";
import { registerCampaignStatus } from "./campaign-status.js";
import { registerCheckBrowser } from "./check-browser.js";
import { registerConnect } from "./connect.js";
import { registerDiscover } from "./discover.js";
import { registerFollowUp } from "./follow-up.js";

export {
  registerBrowse,
  registerCampaignReset,
  registerCampaignStatus,
  registerCheckBrowser,
  registerConnect,
  registerDiscover,
  registerFollowUp,
};

export function registerAllTools(server: McpServer): void {
  registerCheckBrowser(server);
  registerDiscover(server);
  registerConnect(server);
  registerFollowUp(server);
  registerBrowse(server);
  registerCampaignStatus(server);
  registerCampaignReset(server);
}
