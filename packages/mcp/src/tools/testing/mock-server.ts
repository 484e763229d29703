// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { vi } from "vitest";
import { z, type ZodRawShape } from "zod";

type ToolHandler = (args: unknown, extra: { signal: AbortSignal }) => Promise<unknown>;

interface ToolEntry {
  handler: ToolHandler;
  schema: z.ZodObject<ZodRawShape>;
}

/**
 * Stand-in for `McpServer` that records `server.tool(name, description,
 * shape, handler)` registrations.
 */
export function createMockServer() {
  const tools = new Map<string, ToolEntry>();

  const server = {
    tool: vi.fn((name: string, _description: string, shape: ZodRawShape, handler: ToolHandler) => {
      tools.set(name, { handler, schema: z.object(shape) });
    }),
  } as unknown as McpServer;

  function entry(name: string): ToolEntry {
    const found = tools.get(name);
    if (!found) throw new Error(`Tool "${name}" not registered`);
    return found;
  }

  function getSchema(name: string) {
    return entry(name).schema;
  }

  /**
   * Validate `args` against the tool's schema, as the SDK does, then
   * invoke the handler.
   */
  async function callTool(
    name: string,
    args: Record<string, unknown>,
    signal: AbortSignal = new AbortController().signal,
  ): Promise<unknown> {
    const { handler, schema } = entry(name);
    return handler(schema.parse(args), { signal });
  }

  return { server, getSchema, callTool };
}
