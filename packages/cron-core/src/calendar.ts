// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cronwork/cron-core/calendar`
 * Purpose: Gregorian calendar arithmetic used by matching and next-occurrence search.
 * Scope: Leap years, month lengths, day of week. Does not touch Date, clocks or timezones.
 * Invariants: Pure and deterministic. Weekday 0 = Sunday.
 * Side-effects: none
 * Links: src/next-occurrence.ts
 * @public
 */

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Number of days in a 1-based month.
 * Months outside 1-12 report 31; callers only pass validated months.
 */
export function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return MONTH_LENGTHS[month - 1] ?? 31;
}

/**
 * Day of week via Zeller's congruence, remapped from 0=Saturday to 0=Sunday.
 * January and February count as months 13 and 14 of the previous year.
 */
export function dayOfWeek(year: number, month: number, day: number): number {
  const shifted = month < 3;
  const y = shifted ? year - 1 : year;
  const m = shifted ? month + 12 : month;

  const k = mod(y, 100);
  const j = Math.floor(y / 100);

  const h = mod(
    day +
      Math.floor((13 * (m + 1)) / 5) +
      k +
      Math.floor(k / 4) +
      Math.floor(j / 4) -
      2 * j,
    7
  );

  return (h + 6) % 7;
}

function mod(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}
