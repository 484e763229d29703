// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { readFileSync } from "node:fs";

import { errorMessage } from "@steadyhand/core";

/** Split a comma separated `--targets` value. */
export function parseTargetList(raw: string): string[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Parse a targets file: one or more comma separated targets per line;
 * `#` starts a comment.
 */
export function parseTargetsFile(content: string): string[] {
  return content.split(/\r?\n/).flatMap((line) => {
    const hash = line.indexOf("#");
    return parseTargetList(hash === -1 ? line : line.slice(0, hash));
  });
}

export function readTargetsFile(path: string): string[] {
  return parseTargetsFile(readFileSync(path, "utf-8"));
}

/**
 * Targets from `--targets` or `--targets-file`, or `null` after
 * reporting a usage problem.
 */
export function collectTargets(options: { targets?: string; targetsFile?: string }): string[] | null {
  if (options.targets !== undefined && options.targetsFile !== undefined) {
    process.stderr.write("Use only one of --targets or --targets-file.\n");
    process.exitCode = 1;
    return null;
  }
  let targets: string[];
  if (options.targets !== undefined) {
    targets = parseTargetList(options.targets);
  } else if (options.targetsFile !== undefined) {
    try {
      targets = readTargetsFile(options.targetsFile);
    } catch (error) {
      process.stderr.write(`${errorMessage(error)}\n`);
      process.exitCode = 1;
      return null;
    }
  } else {
    process.stderr.write("Either --targets or --targets-file is required.\n");
    process.exitCode = 1;
    return null;
  }
  if (targets.length === 0) {
    process.stderr.write("No targets provided.\n");
    process.exitCode = 1;
    return null;
  }
  return targets;
}
