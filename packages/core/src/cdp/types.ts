// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

/**
 * Entry returned by Chrome's HTTP `/json/list` debugging endpoint.
 *
 * This is not part of the CDP protocol itself; it is Chrome's HTTP
 * interface for target enumeration.
 */
export interface CdpTarget {
  description: string;
  devtoolsFrontendUrl: string;
  id: string;
  title: string;
  type: string;
  url: string;
  /** Missing when another debugger client is already attached. */
  webSocketDebuggerUrl?: string | undefined;
}
