// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { InvalidInputError } from "../errors.js";
import { normalizeTargets } from "../targets/normalize.js";

/**
 * Canonicalise operation targets.
 *
 * @throws {InvalidInputError} when not one of them is a profile.
 */
export function requireTargets(raw: readonly string[]): { targets: string[]; rejected: string[] } {
  const result = normalizeTargets(raw);
  if (result.targets.length === 0) {
    throw new InvalidInputError(
      raw.length === 0 ? "No targets given" : `No valid profile targets among ${String(raw.length)} given`,
    );
  }
  return result;
}
