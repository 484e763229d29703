// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import {
  type Config,
  type ConnectionOptions,
  createLogger,
  errorMessage,
  isSystemicError,
  loadConfig,
  type Logger,
} from "@steadyhand/core";

/** Options every command accepts. */
export interface CommonOptions {
  config?: string;
  cdpPort?: number;
  cdpHost?: string;
  allowRemote?: boolean;
  json?: boolean;
}

/** Configuration for a command, or `null` after reporting why not. */
export function loadCommandConfig(options: CommonOptions): Config | null {
  try {
    return loadConfig({ path: options.config });
  } catch (error) {
    reportError(error);
    return null;
  }
}

export function commandLogger(config: Config): Logger {
  return createLogger({
    level: config.logging.level,
    format: config.logging.format,
    write: (line) => process.stderr.write(line),
  });
}

export function connectionOptions(options: CommonOptions): ConnectionOptions {
  return {
    ...(options.cdpPort !== undefined && { cdpPort: options.cdpPort }),
    ...(options.cdpHost !== undefined && { cdpHost: options.cdpHost }),
    ...(options.allowRemote !== undefined && { allowRemote: options.allowRemote }),
  };
}

/** Print an error and mark the process as failed. */
export function reportError(error: unknown): void {
  const prefix = isSystemicError(error) ? "Run aborted: " : "";
  process.stderr.write(`${prefix}${errorMessage(error)}\n`);
  process.exitCode = 1;
}

export function writeJson(value: unknown): void {
  process.stdout.write(JSON.stringify(value, null, 2) + "\n");
}

/**
 * Run `callback` with a signal that SIGINT or SIGTERM aborts. The run
 * stops between targets; the one in flight is finished.
 */
export async function withStopSignal<T>(callback: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const stop = () => {
    if (!controller.signal.aborted) {
      process.stderr.write("Stopping after the current target...\n");
      controller.abort();
    }
  };
  process.on("SIGINT", stop);
  process.on("SIGTERM", stop);
  try {
    return await callback(controller.signal);
  } finally {
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
  }
}
