// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cronwork/cron-core/next-occurrence`
 * Purpose: Finds the earliest calendar instant strictly after a given one that satisfies a set of cron fields.
 * Scope: Bounded forward search with carry propagation. Does not parse expressions or read a clock.
 * Invariants:
 * - Never returns the input instant itself
 * - Weekday is always derived from (year, month, day), never tracked separately
 * - Gives up with null once the candidate year passes start year + SEARCH_HORIZON_YEARS
 * Side-effects: none
 * Notes: Jumps each unit to its next permitted value and carries on overflow, so the cost is bounded by
 *   days in the horizon rather than seconds. Result is the same instant a second-by-second scan would find.
 * Links: src/calendar.ts, src/field-matcher.ts
 * @public
 */

import { dayOfWeek, daysInMonth } from "./calendar";
import { fieldMatches, nextPermitted } from "./field-matcher";
import type { CalendarInstant, CronFields } from "./types";

export const SEARCH_HORIZON_YEARS = 4;

interface Cursor {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

export function findNextOccurrence(
  fields: CronFields,
  from: CalendarInstant
): CalendarInstant | null {
  const maxYear = from.year + SEARCH_HORIZON_YEARS;
  const c: Cursor = { ...from, second: from.second + 1 };
  carry(c);

  while (c.year <= maxYear) {
    const month = nextPermitted(fields.month, c.month, 12);
    if (month === null) {
      c.year += 1;
      c.month = 1;
      startOfDay(c, 1);
      continue;
    }
    if (month !== c.month) {
      c.month = month;
      startOfDay(c, 1);
      continue;
    }

    const weekday = dayOfWeek(c.year, c.month, c.day);
    if (
      !fieldMatches(fields.day, c.day) ||
      !fieldMatches(fields.weekday, weekday)
    ) {
      startOfDay(c, c.day + 1);
      carry(c);
      continue;
    }

    const hour = nextPermitted(fields.hour, c.hour, 23);
    if (hour === null) {
      startOfDay(c, c.day + 1);
      carry(c);
      continue;
    }
    if (hour !== c.hour) {
      c.hour = hour;
      c.minute = 0;
      c.second = 0;
      continue;
    }

    const minute = nextPermitted(fields.minute, c.minute, 59);
    if (minute === null) {
      c.hour += 1;
      c.minute = 0;
      c.second = 0;
      carry(c);
      continue;
    }
    if (minute !== c.minute) {
      c.minute = minute;
      c.second = 0;
      continue;
    }

    const second = nextPermitted(fields.second, c.second, 59);
    if (second === null) {
      c.minute += 1;
      c.second = 0;
      carry(c);
      continue;
    }
    if (second !== c.second) {
      c.second = second;
      continue;
    }

    return { ...c };
  }

  return null;
}

function startOfDay(c: Cursor, day: number): void {
  c.day = day;
  c.hour = 0;
  c.minute = 0;
  c.second = 0;
}

/** Single overflow pass, smallest unit first. */
function carry(c: Cursor): void {
  if (c.second > 59) {
    c.second = 0;
    c.minute += 1;
  }
  if (c.minute > 59) {
    c.minute = 0;
    c.hour += 1;
  }
  if (c.hour > 23) {
    c.hour = 0;
    c.day += 1;
  }
  if (c.day > daysInMonth(c.year, c.month)) {
    c.day = 1;
    c.month += 1;
  }
  if (c.month > 12) {
    c.month = 1;
    c.year += 1;
  }
}
