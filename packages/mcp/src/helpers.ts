// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import {
  type Config,
  ConfigError,
  type ConnectionOptions,
  createLogger,
  errorMessage,
  InvalidInputError,
  isSystemicError,
  type Logger,
} from "@steadyhand/core";
import { z } from "zod";

type TextContent = { type: "text"; text: string };
type McpResult = { isError?: boolean; content: TextContent[] };

/** Configuration file field shared by every tool. */
export const configPathSchema = {
  config: z
    .string()
    .optional()
    .describe("Configuration file (default: ./steadyhand.yaml or STEADYHAND_CONFIG)"),
};

/**
 * Shared Zod schema fields for the browser's debugging endpoint.
 *
 * Spread into every tool that attaches to the browser:
 * ```ts
 * { query: z.string(), ...cdpConnectionSchema }
 * ```
 */
export const cdpConnectionSchema = {
  cdpPort: z
    .number()
    .int()
    .positive()
    .optional()
    .describe("CDP port (default: browser.cdpPort from configuration)"),
  cdpHost: z
    .string()
    .optional()
    .describe("CDP host (default: browser.cdpHost from configuration)"),
  allowRemote: z
    .boolean()
    .optional()
    .describe("SECURITY: Allow non-loopback CDP connections. Only use if the network path is secured."),
};

/** Build the connection overrides from parsed tool arguments. */
export function buildConnectionOptions(args: {
  cdpPort?: number | undefined;
  cdpHost?: string | undefined;
  allowRemote?: boolean | undefined;
}): ConnectionOptions {
  return {
    ...(args.cdpPort !== undefined && { cdpPort: args.cdpPort }),
    ...(args.cdpHost !== undefined && { cdpHost: args.cdpHost }),
    ...(args.allowRemote !== undefined && { allowRemote: args.allowRemote }),
  };
}

/** Logger for tool runs; stdout carries the protocol, so records go to stderr. */
export function toolLogger(config: Config): Logger {
  return createLogger({
    level: config.logging.level,
    format: config.logging.format,
    write: (line) => process.stderr.write(line),
  });
}

/**
 * Build an MCP error response from a plain message string.
 */
export function mcpError(text: string): McpResult {
  return {
    isError: true,
    content: [{ type: "text" as const, text }],
  };
}

/**
 * Build an MCP success response from a plain text or JSON payload.
 */
export function mcpSuccess(text: string): McpResult {
  return {
    content: [{ type: "text" as const, text }],
  };
}

export function mcpJson(value: unknown): McpResult {
  return mcpSuccess(JSON.stringify(value, null, 2));
}

/**
 * Map configuration, input and run-aborting errors to an MCP error
 * response. Returns `undefined` for anything else.
 */
export function mapErrorToMcpResponse(error: unknown): McpResult | undefined {
  if (error instanceof ConfigError || error instanceof InvalidInputError) {
    return mcpError(error.message);
  }
  if (isSystemicError(error)) {
    return mcpError(`Run aborted: ${errorMessage(error)}`);
  }
  return undefined;
}

/**
 * Map an arbitrary caught error to an MCP error response with a
 * contextual prefix (e.g. "Failed to send invitations").
 */
export function mcpCatchAll(error: unknown, prefix: string): McpResult {
  const mapped = mapErrorToMcpResponse(error);
  if (mapped) return mapped;

  const message = errorMessage(error);
  return mcpError(`${prefix}: ${message}`);
}
