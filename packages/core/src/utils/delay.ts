// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

/**
 * Return a promise that resolves after the given number of milliseconds.
 *
 * When a signal is given the promise resolves early as soon as it is
 * aborted; callers check `signal.aborted` afterwards.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Wait function injected into everything that paces itself, so tests can
 * substitute a recording, non-blocking implementation.
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;
