// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cronwork/cron-core/types`
 * Purpose: Shared types for the cron engine: field names, field domains, matchers and calendar instants.
 * Scope: Type definitions and the field domain table. Does not contain parsing or search logic.
 * Invariants: FIELD_DOMAINS is frozen; weekday 0 = Sunday.
 * Side-effects: none
 * Links: src/field-matcher.ts, src/expression.ts
 * @public
 */

export const FIELD_NAMES = [
  "second",
  "minute",
  "hour",
  "day",
  "month",
  "weekday",
] as const;
export type FieldName = (typeof FIELD_NAMES)[number];

export interface FieldDomain {
  readonly min: number;
  readonly max: number;
}

export const FIELD_DOMAINS: Readonly<Record<FieldName, FieldDomain>> =
  Object.freeze({
    second: Object.freeze({ min: 0, max: 59 }),
    minute: Object.freeze({ min: 0, max: 59 }),
    hour: Object.freeze({ min: 0, max: 23 }),
    day: Object.freeze({ min: 1, max: 31 }),
    month: Object.freeze({ min: 1, max: 12 }),
    weekday: Object.freeze({ min: 0, max: 6 }),
  });

/**
 * Parsed form of one cron field.
 * `values` is non-empty, strictly ascending and inside the field's domain.
 */
export type FieldMatcher =
  | { readonly kind: "any" }
  | { readonly kind: "values"; readonly values: readonly number[] };

/** One matcher per calendar unit. */
export type CronFields = Readonly<Record<FieldName, FieldMatcher>>;

/** Calendar fields as decomposed by the caller. Month is 1-based. */
export interface CalendarInstant {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

export interface CronExpr {
  matches(
    second: number,
    minute: number,
    hour: number,
    day: number,
    month: number,
    weekday: number
  ): boolean;
  asString(): string;
}

export interface CronSchedule extends CronExpr {
  /**
   * Earliest instant strictly after the given one that matches,
   * or null when none exists within the search horizon.
   */
  nextAfter(
    year: number,
    month: number,
    day: number,
    hour: number,
    minute: number,
    second: number
  ): CalendarInstant | null;
}

export interface CronParser<TExpr extends CronExpr = CronExpr> {
  /** `minute hour day month weekday`; seconds fixed to 0. */
  parse(text: string): TExpr;
  /** `second minute hour day month weekday`. */
  parseWithSeconds(text: string): TExpr;
}
