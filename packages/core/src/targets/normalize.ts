// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

/** Canonical origin every normalised target uses. */
export const PROFILE_ORIGIN = "https://www.linkedin.com";

const NON_PROFILE_SEGMENTS = ["company", "school", "groups", "events", "jobs", "posts"];

/**
 * Canonicalise a profile reference to `https://www.linkedin.com/in/<slug>`.
 *
 * Accepts absolute URLs on any `linkedin.com` host and relative `/in/`
 * paths. Query, fragment, trailing slash and anything after the slug are
 * dropped; slug case is preserved. Returns `null` for anything that is
 * not a member profile.
 *
 * @example
 * normalizeTarget("https://de.linkedin.com/in/dana-s/?trk=x#about")
 * // => "https://www.linkedin.com/in/dana-s"
 */
export function normalizeTarget(raw: string): string | null {
  const input = raw.trim();
  if (input === "" || input.includes("urn:li:fs_miniProfile:")) {
    return null;
  }

  let url: URL;
  try {
    url = input.startsWith("/") ? new URL(input, PROFILE_ORIGIN) : new URL(withScheme(input));
  } catch {
    return null;
  }

  if (url.protocol !== "https:" && url.protocol !== "http:") {
    return null;
  }
  const host = url.hostname.toLowerCase();
  if (host !== "linkedin.com" && !host.endsWith(".linkedin.com")) {
    return null;
  }

  const segments = url.pathname.split("/").filter((s) => s.length > 0);
  const [kind, slug] = segments;
  if (kind === undefined || NON_PROFILE_SEGMENTS.includes(kind.toLowerCase())) {
    return null;
  }
  if (kind.toLowerCase() !== "in" || slug === undefined) {
    return null;
  }

  let decoded: string;
  try {
    decoded = decodeURIComponent(slug);
  } catch {
    return null;
  }
  if (decoded.trim() === "") {
    return null;
  }
  return `${PROFILE_ORIGIN}/in/${encodeURIComponent(decoded)}`;
}

/**
 * Whether `raw` refers to a member profile.
 */
export function isProfileReference(raw: string): boolean {
  return normalizeTarget(raw) !== null;
}

/**
 * Normalise a list of references, dropping invalid ones. Order and
 * repeated entries are kept; the engine reports repeats as duplicates.
 *
 * @returns the canonical targets and the inputs that were rejected.
 */
export function normalizeTargets(raw: readonly string[]): {
  targets: string[];
  rejected: string[];
} {
  const targets: string[] = [];
  const rejected: string[] = [];
  for (const entry of raw) {
    const target = normalizeTarget(entry);
    if (target === null) {
      rejected.push(entry);
    } else {
      targets.push(target);
    }
  }
  return { targets, rejected };
}

/**
 * People-search URL for `query`, optionally at a given result page.
 */
export function searchUrl(query: string, page = 1): string {
  const url = new URL("/search/results/people/", PROFILE_ORIGIN);
  url.searchParams.set("keywords", query);
  if (page > 1) {
    url.searchParams.set("page", String(page));
  }
  return url.toString();
}

function withScheme(input: string): string {
  return /^[a-z][a-z0-9+.-]*:/i.test(input) ? input : `https://${input}`;
}
