// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { readFileSync } from "node:fs";

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { DEFAULT_CDP_HOST } from "../cdp/discovery.js";
import { DEFAULT_CDP_PORT } from "../constants.js";
import { DEFAULT_TYPING_OPTIONS, type TypingOptions } from "../humanize/keystrokes.js";
import { isLogLevel, LOG_FORMATS, LOG_LEVELS } from "../logging/logger.js";
import type { WorkflowKind } from "../state/campaign-state.js";
import { errorMessage } from "../utils/error-message.js";
import { isNotFound } from "../utils/not-found.js";
import { ConfigError } from "./errors.js";

export const DEFAULT_CONFIG_FILE = "steadyhand.yaml";
export const CONFIG_PATH_ENV = "STEADYHAND_CONFIG";
export const LOG_LEVEL_ENV = "STEADYHAND_LOG_LEVEL";

const millis = z.number().int().nonnegative();
const probability = z.number().min(0).max(1);
const quota = z.number().int().nonnegative();

function range(defaults: [number, number]) {
  return z
    .tuple([millis, millis])
    .refine(([min, max]) => max >= min, { message: "range maximum must not be below its minimum" })
    .default(defaults);
}

const timingSchema = z
  .object({
    minDelayMs: z.number().int().positive().default(750),
    maxDelayMs: z.number().int().positive().default(2250),
  })
  .refine((t) => t.maxDelayMs >= t.minDelayMs, {
    message: "maxDelayMs must not be below minDelayMs",
    path: ["maxDelayMs"],
  });

const motionSchema = z
  .object({
    curvature: z.number().min(0).max(1).default(0.1),
    jitterPx: z.number().nonnegative().default(3),
    overshootProbability: probability.default(0.22),
    minStepDelayMs: millis.default(4),
    maxStepDelayMs: millis.default(16),
  })
  .refine((m) => m.maxStepDelayMs >= m.minStepDelayMs, {
    message: "maxStepDelayMs must not be below minStepDelayMs",
    path: ["maxStepDelayMs"],
  });

const typingSchema = z.object({
  keyDelayMs: range([35, 95]),
  typoProbability: probability.default(0.05),
  hesitationProbability: probability.default(0.04),
  hesitationMs: range([250, 900]),
});

const locatorSchema = z.object({
  strategyTimeoutMs: millis.default(3_000),
  indicatorTimeoutMs: millis.default(2_000),
  rolesFile: z.string().min(1).optional(),
});

const limitsSchema = z.object({
  discovery: quota.default(100),
  connect: quota.default(10),
  followUp: quota.default(5),
});

const pacingSchema = z.object({
  connect: range([8_000, 13_000]),
  followUp: range([15_000, 20_000]),
  discovery: range([15_000, 25_000]),
});

const connectSchema = z.object({
  note: z
    .object({
      enabled: z.boolean().default(true),
      template: z
        .string()
        .default("Hi {{name}}, I came across your profile and would like to connect."),
      context: z.string().default(""),
    })
    .default({}),
});

const followUpSchema = z.object({
  template: z
    .string()
    .default("Hi {{name}}, thanks for connecting! I enjoyed reading about {{context}}."),
  context: z.string().default(""),
});

const browseSchema = z.object({
  tour: z.string().min(1).default("quick"),
  toursFile: z.string().min(1).optional(),
});

const browserSchema = z.object({
  cdpPort: z.number().int().min(1).max(65_535).default(DEFAULT_CDP_PORT),
  cdpHost: z.string().min(1).default(DEFAULT_CDP_HOST),
  allowRemote: z.boolean().default(false),
  navigationTimeoutMs: z.number().int().positive().default(30_000),
});

export const configSchema = z.object({
  timing: timingSchema.default({}),
  motion: motionSchema.default({}),
  typing: typingSchema.default({}),
  locator: locatorSchema.default({}),
  limits: limitsSchema.default({}),
  pacing: pacingSchema.default({}),
  discovery: z.object({ maxPages: z.number().int().positive().default(3) }).default({}),
  connect: connectSchema.default({}),
  followUp: followUpSchema.default({}),
  browse: browseSchema.default({}),
  storage: z.object({ dir: z.string().min(1).default("data") }).default({}),
  browser: browserSchema.default({}),
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default("info"),
      format: z.enum(LOG_FORMATS).default("json"),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Validate a parsed configuration document, filling every omitted field.
 * An empty document yields the defaults.
 *
 * @throws {ConfigError} naming the first offending field.
 */
export function parseConfig(doc: unknown, source?: string): Config {
  const result = configSchema.safeParse(doc ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue === undefined ? "" : issue.path.join(".");
    throw new ConfigError(
      `Invalid configuration${where === "" ? "" : ` at "${where}"`}: ${issue?.message ?? "unknown error"}`,
      source,
    );
  }
  return result.data;
}

export interface LoadConfigOptions {
  /** Explicit file; must exist. */
  readonly path?: string | undefined;
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from `path`, `$STEADYHAND_CONFIG` or
 * `./steadyhand.yaml`, in that order, then apply environment overrides.
 *
 * A missing default file means "all defaults"; a missing explicit file is
 * an error.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const explicit = options.path ?? nonEmpty(env[CONFIG_PATH_ENV]);
  const path = explicit ?? DEFAULT_CONFIG_FILE;

  let text: string | null;
  try {
    text = readFileSync(path, "utf-8");
  } catch (error) {
    if (explicit === undefined && isNotFound(error)) {
      text = null;
    } else {
      throw new ConfigError(`Cannot read configuration: ${errorMessage(error)}`, path, { cause: error });
    }
  }

  let config: Config;
  if (text === null) {
    config = parseConfig({});
  } else {
    let doc: unknown;
    try {
      doc = parseYaml(text);
    } catch (error) {
      throw new ConfigError(`Invalid YAML: ${errorMessage(error)}`, path, { cause: error });
    }
    config = parseConfig(doc, path);
  }

  return applyEnvOverrides(config, env);
}

function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv): Config {
  const level = nonEmpty(env[LOG_LEVEL_ENV]);
  if (level === undefined) {
    return config;
  }
  const normalized = level.toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new ConfigError(`Invalid ${LOG_LEVEL_ENV} "${level}": expected one of ${LOG_LEVELS.join(", ")}`);
  }
  return { ...config, logging: { ...config.logging, level: normalized } };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

/** Keystroke options for the configured typing profile. */
export function typingOptions(config: Config): TypingOptions {
  return { ...DEFAULT_TYPING_OPTIONS, ...config.typing };
}

/** Configured daily cap for `workflow`. */
export function dailyQuota(config: Config, workflow: WorkflowKind): number {
  switch (workflow) {
    case "discovery":
      return config.limits.discovery;
    case "connect":
      return config.limits.connect;
    case "follow-up":
      return config.limits.followUp;
  }
}
