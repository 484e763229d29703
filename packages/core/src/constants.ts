// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

/**
 * Remote debugging port a locally started Chromium listens on by default.
 */
export const DEFAULT_CDP_PORT = 9222;
