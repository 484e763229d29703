// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { campaignStatus, loadConfig, WORKFLOW_KINDS } from "@steadyhand/core";
import { z } from "zod";

import { configPathSchema, mcpCatchAll, mcpJson } from "../helpers.js";

export function registerCampaignStatus(server: McpServer): void {
  server.tool(
    "campaign-status",
    "Show a workflow's persisted progress: today's count against the quota, and which targets succeeded, failed or were skipped. Does not touch the browser.",
    {
      workflow: z.enum(WORKFLOW_KINDS).describe("Workflow name"),
      ...configPathSchema,
    },
    async ({ workflow, config: configPath }) => {
      try {
        const config = loadConfig({ path: configPath });
        return mcpJson(await campaignStatus({ workflow, config }));
      } catch (error) {
        return mcpCatchAll(error, "Failed to read campaign status");
      }
    },
  );
}
