/**
 * Built-in field rules
 *
 * Every rule except `required` passes on an empty value, so optional
 * fields only need `required` added when they become mandatory.
 *
 * @example
 * ```ts
 * const rules: FieldRules<SignupValues> = {
 *   email: [required("Email is required"), email()],
 *   password: [required(), minLength(8)],
 *   confirmPassword: matchesField("password", "Passwords must match"),
 * };
 * ```
 */

import type { Rule, ValueRule } from "./types";

export const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
export const PHONE_PATTERN = /^\+?[1-9]\d{1,14}$/;

export function isEmptyValue(value: unknown): boolean {
  if (value === undefined || value === null || value === false) return true;
  if (typeof value === "string") return value.trim().length === 0;
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

function lengthOf(value: unknown): number | undefined {
  if (typeof value === "string" || Array.isArray(value)) return value.length;
  return undefined;
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isNaN(value) ? undefined : value;
  if (typeof value === "string") {
    const parsed = Number(value.trim());
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
}

// ============================================================================
// Presence & Length
// ============================================================================

export function required(message = "This field is required"): ValueRule {
  return (value) => (isEmptyValue(value) ? message : undefined);
}

export function minLength(length: number, message = `Must be at least ${length} characters`): ValueRule {
  return (value) => {
    if (isEmptyValue(value)) return undefined;
    const actual = lengthOf(value);
    return actual !== undefined && actual < length ? message : undefined;
  };
}

export function maxLength(length: number, message = `Must be at most ${length} characters`): ValueRule {
  return (value) => {
    if (isEmptyValue(value)) return undefined;
    const actual = lengthOf(value);
    return actual !== undefined && actual > length ? message : undefined;
  };
}

// ============================================================================
// Format
// ============================================================================

export function pattern(regex: RegExp, message = "Invalid format"): ValueRule {
  return (value) => {
    if (isEmptyValue(value) || typeof value !== "string") return undefined;
    regex.lastIndex = 0;
    return regex.test(value) ? undefined : message;
  };
}

export function email(message = "Please enter a valid email address"): ValueRule {
  return pattern(EMAIL_PATTERN, message);
}

export function phone(message = "Please enter a valid phone number"): ValueRule {
  return pattern(PHONE_PATTERN, message);
}

// ============================================================================
// Numbers
// ============================================================================

const INVALID_NUMBER = "Please enter a valid number";

export function min(limit: number, message = `Must be at least ${limit}`): ValueRule {
  return (value) => {
    if (isEmptyValue(value)) return undefined;
    const parsed = toNumber(value);
    if (parsed === undefined) return INVALID_NUMBER;
    return parsed < limit ? message : undefined;
  };
}

export function max(limit: number, message = `Must be at most ${limit}`): ValueRule {
  return (value) => {
    if (isEmptyValue(value)) return undefined;
    const parsed = toNumber(value);
    if (parsed === undefined) return INVALID_NUMBER;
    return parsed > limit ? message : undefined;
  };
}

// ============================================================================
// Cross-field & Composition
// ============================================================================

export function matchesField(field: string, message = `Must match ${field}`) {
  return (value: unknown, values: object): string | undefined => {
    const other: unknown = Reflect.get(values, field);
    return Object.is(value, other) ? undefined : message;
  };
}

export function composeRules<V, T>(...rules: ReadonlyArray<Rule<V, T>>): Rule<V, T> {
  return (value, values) => {
    for (const rule of rules) {
      const message = rule(value, values);
      if (message) return message;
    }
    return undefined;
  };
}
