// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

export { DEFAULT_CDP_HOST, discoverTargets, pageTargets } from "./discovery.js";
export { CDPConnectionError, CDPError } from "./errors.js";
export type { CdpTarget } from "./types.js";
