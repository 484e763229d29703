// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

export {
  ElementLocator,
  type LocateResult,
  type LocatorOptions,
  matchesKeywords,
} from "./locator.js";
export {
  loadRoleCatalogue,
  parseRoleCatalogue,
  RoleCatalogue,
  type RoleDefinition,
  type RoleName,
  ROLES,
  type Strategy,
  type UnavailableIndicator,
} from "./roles.js";
