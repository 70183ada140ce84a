// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cronwork/cron-core/tests/helpers`
 * Purpose: Shared helpers for cron-core unit tests.
 * Scope: Error capture and a second-by-second reference scanner. Does not import test runner APIs.
 * Invariants: Reference scanner uses Date UTC arithmetic only, independent of src/calendar.ts.
 * Side-effects: none
 * Links: tests/*.test.ts
 * @internal
 */

import type { CalendarInstant, CronExpr } from "../src";

/**
 * Runs `fn` and returns the error it throws, which must be an instance of `type`.
 */
export function catchError<T extends Error>(
  fn: () => unknown,
  type: new (...args: never[]) => T
): T {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error("expected function to throw");
}

export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected function to throw");
}

export function instant(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0
): CalendarInstant {
  return { year, month, day, hour, minute, second };
}

/**
 * Steps one second at a time from `start` (exclusive), up to `limitSeconds`.
 */
export function scanNext(
  expr: CronExpr,
  start: CalendarInstant,
  limitSeconds: number
): CalendarInstant | null {
  let t = Date.UTC(
    start.year,
    start.month - 1,
    start.day,
    start.hour,
    start.minute,
    start.second
  );
  for (let i = 0; i < limitSeconds; i++) {
    t += 1000;
    const d = new Date(t);
    if (
      expr.matches(
        d.getUTCSeconds(),
        d.getUTCMinutes(),
        d.getUTCHours(),
        d.getUTCDate(),
        d.getUTCMonth() + 1,
        d.getUTCDay()
      )
    ) {
      return instant(
        d.getUTCFullYear(),
        d.getUTCMonth() + 1,
        d.getUTCDate(),
        d.getUTCHours(),
        d.getUTCMinutes(),
        d.getUTCSeconds()
      );
    }
  }
  return null;
}
