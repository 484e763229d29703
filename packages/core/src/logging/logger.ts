// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { errorMessage } from "../utils/error-message.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_FORMATS = ["json", "text"] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

export type LogFields = Readonly<Record<string, unknown>>;

/**
 * Leveled, structured logger. Records go to stderr so that stdout stays
 * reserved for command output.
 */
export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** Logger that adds `fields` to every record. */
  child(fields: LogFields): Logger;
}

export interface LoggerOptions {
  readonly level?: LogLevel;
  readonly format?: LogFormat;
  /** Line sink (default: `process.stderr`). */
  readonly write?: (line: string) => void;
  readonly clock?: () => Date;
}

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Create a logger writing one line per record.
 *
 * `json` lines look like `{"ts":"...","level":"info","msg":"...",...}`;
 * `text` lines like `<ts> INFO msg key=value`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = SEVERITY[options.level ?? "info"];
  const format = options.format ?? "json";
  const write = options.write ?? ((line: string) => process.stderr.write(line));
  const clock = options.clock ?? (() => new Date());

  function build(bound: LogFields): Logger {
    const emit = (level: LogLevel, message: string, fields?: LogFields) => {
      if (SEVERITY[level] < threshold) return;
      const merged = normalize({ ...bound, ...fields });
      const ts = clock().toISOString();
      write(
        format === "json"
          ? JSON.stringify({ ts, level, msg: message, ...merged }) + "\n"
          : formatText(ts, level, message, merged),
      );
    };
    return {
      debug: (message, fields) => emit("debug", message, fields),
      info: (message, fields) => emit("info", message, fields),
      warn: (message, fields) => emit("warn", message, fields),
      error: (message, fields) => emit("error", message, fields),
      child: (fields) => build({ ...bound, ...fields }),
    };
  }

  return build({});
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};

function normalize(fields: LogFields): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    out[key] = value instanceof Error ? errorMessage(value) : value;
  }
  return out;
}

function formatText(
  ts: string,
  level: LogLevel,
  message: string,
  fields: Record<string, unknown>,
): string {
  const pairs = Object.entries(fields).map(([key, value]) => {
    const text = typeof value === "string" ? value : JSON.stringify(value);
    return `${key}=${/\s/.test(text) ? JSON.stringify(text) : text}`;
  });
  return [ts, level.toUpperCase(), message, ...pairs].join(" ") + "\n";
}
