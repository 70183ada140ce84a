// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cronwork/cron-core/expression`
 * Purpose: Immutable parsed cron expression: six field matchers plus the verbatim source text.
 * Scope: Matching and next-occurrence queries. Does not parse; construct via parse()/parseWithSeconds().
 * Invariants: Immutable after construction; asString() returns the parser input unchanged.
 * Side-effects: none
 * Links: src/parser.ts, src/next-occurrence.ts
 * @public
 */

import { fieldMatches } from "./field-matcher";
import { findNextOccurrence } from "./next-occurrence";
import type { CalendarInstant, CronFields, CronSchedule } from "./types";

export class CronExpression implements CronSchedule {
  private readonly fields: CronFields;

  constructor(
    private readonly source: string,
    fields: CronFields
  ) {
    this.fields = Object.freeze({ ...fields });
    Object.freeze(this);
  }

  /**
   * True when every field accepts its component. Inputs are not range-checked;
   * an out-of-domain value only matches an unconstrained field.
   */
  matches(
    second: number,
    minute: number,
    hour: number,
    day: number,
    month: number,
    weekday: number
  ): boolean {
    const f = this.fields;
    return (
      fieldMatches(f.second, second) &&
      fieldMatches(f.minute, minute) &&
      fieldMatches(f.hour, hour) &&
      fieldMatches(f.day, day) &&
      fieldMatches(f.month, month) &&
      fieldMatches(f.weekday, weekday)
    );
  }

  nextAfter(
    year: number,
    month: number,
    day: number,
    hour: number,
    minute: number,
    second: number
  ): CalendarInstant | null {
    return findNextOccurrence(this.fields, {
      year,
      month,
      day,
      hour,
      minute,
      second,
    });
  }

  /** Field matchers, for inspection. */
  get matchers(): CronFields {
    return this.fields;
  }

  asString(): string {
    return this.source;
  }

  toString(): string {
    return this.source;
  }
}
