// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

export {
  isOnTab,
  loadTourCatalogue,
  parseTourCatalogue,
  TAB_NAMES,
  type TabDefinition,
  type TabName,
  TABS,
  tabUrl,
  TourCatalogue,
  type TourDefinition,
  type TourStep,
} from "./tours.js";
