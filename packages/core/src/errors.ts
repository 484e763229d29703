// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

/**
 * Base class for every error raised by this package.
 */
export class SteadyhandError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SteadyhandError";
  }
}

/**
 * An error that invalidates the whole run rather than a single target
 * (storage unavailable, automation context gone, unreadable state).
 *
 * The campaign engine persists what it knows and re-throws these.
 */
export class SystemicError extends SteadyhandError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SystemicError";
  }
}

/**
 * Base class for failures scoped to one target. The engine records
 * them and moves on.
 */
export class TargetError extends SteadyhandError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TargetError";
  }
}

/**
 * Thrown when a target cannot be acted upon for a reason that is not a
 * failure (already connected, invitation pending, messaging restricted).
 */
export class TargetIneligibleError extends TargetError {
  readonly role: string;
  readonly reason: string;

  constructor(role: string, reason: string) {
    super(`Target ineligible (${role}): ${reason}`);
    this.name = "TargetIneligibleError";
    this.role = role;
    this.reason = reason;
  }
}

/**
 * Thrown when no strategy for a role produced a validated element and no
 * unavailability indicator was present either.
 */
export class ElementNotFoundError extends TargetError {
  readonly role: string;

  constructor(role: string, tried: readonly string[] = []) {
    super(
      `Element not found for role "${role}"` +
        (tried.length > 0 ? ` (tried: ${tried.join(", ")})` : ""),
    );
    this.name = "ElementNotFoundError";
    this.role = role;
  }
}

/**
 * Thrown when an input event (key, click, scroll) could not be delivered.
 */
export class DeliveryError extends TargetError {
  readonly action: string;

  constructor(action: string, message: string, options?: ErrorOptions) {
    super(`Failed to ${action}: ${message}`, options);
    this.name = "DeliveryError";
    this.action = action;
  }
}

/**
 * Thrown when an action ran but the page does not show its effect.
 */
export class VerificationError extends TargetError {
  constructor(message: string) {
    super(message);
    this.name = "VerificationError";
  }
}

/**
 * Thrown when an operation is called with input it cannot act on, such
 * as an empty search query or a target list without a single profile.
 */
export class InvalidInputError extends SteadyhandError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

/**
 * Whether an error should abort a run instead of being recorded against
 * the current target.
 */
export function isSystemicError(error: unknown): error is SystemicError {
  return error instanceof SystemicError;
}
