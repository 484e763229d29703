// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { campaignReset, loadConfig, WORKFLOW_KINDS } from "@steadyhand/core";
import { z } from "zod";

import { configPathSchema, mcpCatchAll, mcpJson } from "../helpers.js";

export function registerCampaignReset(server: McpServer): void {
  server.tool(
    "campaign-reset",
    "Forget a workflow's progress so every target is eligible again and the daily count restarts. Cannot be undone.",
    {
      workflow: z.enum(WORKFLOW_KINDS).describe("Workflow name"),
      includeSeen: z
        .boolean()
        .optional()
        .default(false)
        .describe("Also forget which profiles discovery has seen"),
      ...configPathSchema,
    },
    async ({ workflow, includeSeen, config: configPath }) => {
      try {
        const config = loadConfig({ path: configPath });
        const result = await campaignReset({ workflow, config, includeSeen });
        return mcpJson({ success: true, ...result });
      } catch (error) {
        return mcpCatchAll(error, "Failed to reset campaign");
      }
    },
  );
}
