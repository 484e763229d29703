// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

export {
  isProfileReference,
  normalizeTarget,
  normalizeTargets,
  PROFILE_ORIGIN,
  searchUrl,
} from "./normalize.js";
