// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cronwork/cron-core/field-matcher`
 * Purpose: Parses one cron field into a matcher and answers membership queries against it.
 * Scope: Field grammar (`*`, values, ranges, steps, lists) and per-field validation. Does not split expressions into fields.
 * Invariants:
 * - A lone `*` yields { kind: "any" }; everything else yields a sorted, duplicate-free, non-empty value list
 * - Every literal number, including the base of a step, must lie inside the field domain (OUT_OF_RANGE otherwise)
 * - Step 0 is INVALID_STEP
 * - Returned matchers are frozen
 * Side-effects: none
 * Links: src/types.ts, src/errors.ts
 * @public
 */

import {
  InvalidFieldError,
  InvalidStepError,
  OutOfRangeError,
} from "./errors";
import {
  FIELD_DOMAINS,
  type FieldDomain,
  type FieldMatcher,
  type FieldName,
} from "./types";

const DIGITS = /^\d+$/;

export const ANY: FieldMatcher = Object.freeze({ kind: "any" });

export function valuesMatcher(values: readonly number[]): FieldMatcher {
  return Object.freeze({
    kind: "values",
    values: Object.freeze([...values]),
  });
}

/**
 * Parse a single cron field against the domain of `field`.
 * @throws InvalidFieldError | OutOfRangeError | InvalidStepError
 */
export function parseField(text: string, field: FieldName): FieldMatcher {
  const source = text.trim();
  if (source === "*") {
    return ANY;
  }

  const domain = FIELD_DOMAINS[field];
  const values = new Set<number>();

  for (const rawItem of source.split(",")) {
    for (const value of expandItem(rawItem.trim(), field, domain)) {
      values.add(value);
    }
  }

  return valuesMatcher([...values].sort((a, b) => a - b));
}

export function fieldMatches(matcher: FieldMatcher, value: number): boolean {
  switch (matcher.kind) {
    case "any":
      return true;
    case "values":
      return matcher.values.includes(value);
    default: {
      const unreachable: never = matcher;
      return unreachable;
    }
  }
}

/**
 * Smallest permitted value in [from, max], or null if there is none.
 */
export function nextPermitted(
  matcher: FieldMatcher,
  from: number,
  max: number
): number | null {
  switch (matcher.kind) {
    case "any":
      return from <= max ? from : null;
    case "values":
      return matcher.values.find((v) => v >= from && v <= max) ?? null;
    default: {
      const unreachable: never = matcher;
      return unreachable;
    }
  }
}

function expandItem(
  item: string,
  field: FieldName,
  domain: FieldDomain
): number[] {
  const slash = item.indexOf("/");
  if (slash !== -1) {
    return expandStep(item, slash, field, domain);
  }

  const dash = item.indexOf("-");
  if (dash !== -1) {
    const [start, end] = parseRange(item, dash, field, domain);
    return sequence(start, end, 1);
  }

  const value = parseNumber(item, item, field, "invalid value");
  assertInDomain(value, field, domain);
  return [value];
}

function expandStep(
  item: string,
  slash: number,
  field: FieldName,
  domain: FieldDomain
): number[] {
  const base = item.slice(0, slash);
  const step = parseNumber(item.slice(slash + 1), item, field, "invalid step");
  if (step === 0) {
    throw new InvalidStepError(field, step);
  }

  if (base === "*") {
    return sequence(domain.min, domain.max, step);
  }

  const dash = base.indexOf("-");
  if (dash !== -1) {
    const [start, end] = parseRange(base, dash, field, domain, item);
    return sequence(start, end, step);
  }

  const start = parseNumber(base, item, field, "invalid value");
  assertInDomain(start, field, domain);
  return sequence(start, domain.max, step);
}

function parseRange(
  range: string,
  dash: number,
  field: FieldName,
  domain: FieldDomain,
  item: string = range
): [number, number] {
  const start = parseNumber(
    range.slice(0, dash),
    item,
    field,
    "invalid range start"
  );
  const end = parseNumber(
    range.slice(dash + 1),
    item,
    field,
    "invalid range end"
  );

  if (start > end) {
    throw new InvalidFieldError(field, item, "range start > end");
  }
  assertInDomain(start, field, domain);
  assertInDomain(end, field, domain);
  return [start, end];
}

function parseNumber(
  token: string,
  item: string,
  field: FieldName,
  reason: string
): number {
  if (!DIGITS.test(token)) {
    throw new InvalidFieldError(field, item, reason);
  }
  return Number.parseInt(token, 10);
}

function assertInDomain(
  value: number,
  field: FieldName,
  domain: FieldDomain
): void {
  if (value < domain.min || value > domain.max) {
    throw new OutOfRangeError(field, value, domain.min, domain.max);
  }
}

function sequence(start: number, end: number, step: number): number[] {
  const out: number[] = [];
  for (let v = start; v <= end; v += step) {
    out.push(v);
  }
  return out;
}
