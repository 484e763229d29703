// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

/**
 * Values substituted into outgoing note and message templates.
 */
export interface TemplateValues {
  /** Recipient's first name, when it could be read from the page. */
  readonly name?: string | undefined;
  /** Free-form context sentence configured by the operator. */
  readonly context?: string | undefined;
}

export interface PersonalizeOptions {
  /** Hard character limit of the destination field. */
  readonly maxLength: number;
  /** Substitute for an empty `{{context}}` (default `your profile`). */
  readonly contextFallback?: string;
}

const NAME_FALLBACK = "there";
const DEFAULT_CONTEXT_FALLBACK = "your profile";
const GREETING_WITH_NAME = /\b(Hi|Hello|Hey|Dear) \{\{name\}\}/g;

/**
 * Fill `{{name}}` and `{{context}}` placeholders.
 *
 * With no usable name a greeting such as `Hi {{name}},` collapses to
 * `Hi,`; any other `{{name}}` becomes `there`. The result is cut to
 * `maxLength` characters (code points, not UTF-16 units).
 *
 * @example
 * personalize("Hi {{name}}, saw {{context}}.", { name: "Dana" }, { maxLength: 300 })
 * // => "Hi Dana, saw your profile."
 */
export function personalize(
  template: string,
  values: TemplateValues,
  options: PersonalizeOptions,
): string {
  const name = values.name?.trim() ?? "";
  const context = values.context?.trim() ?? "";

  let text = template;
  if (name === "") {
    text = text.replace(GREETING_WITH_NAME, "$1");
  }
  text = text
    .replaceAll("{{name}}", name === "" ? NAME_FALLBACK : name)
    .replaceAll(
      "{{context}}",
      context === "" ? (options.contextFallback ?? DEFAULT_CONTEXT_FALLBACK) : context,
    );

  return truncate(text, options.maxLength);
}

/**
 * Cut a string to at most `maxLength` code points.
 */
export function truncate(text: string, maxLength: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxLength) {
    return text;
  }
  return chars.slice(0, Math.max(0, maxLength)).join("").trimEnd();
}

/**
 * Extract a first name from a displayed full name.
 *
 * Drops anything after a comma (credentials) and honorifics such as
 * `Dr.`; returns an empty string when nothing usable remains.
 */
export function firstName(fullName: string): string {
  const beforeComma = fullName.split(",")[0] ?? "";
  const tokens = beforeComma
    .trim()
    .split(/\s+/)
    .filter((t) => t.length > 0 && !/^(dr|mr|mrs|ms|prof)\.?$/i.test(t));
  const first = tokens[0] ?? "";
  return /\p{L}/u.test(first) ? first : "";
}
