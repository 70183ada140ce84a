// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cronwork/cron-probe/clock`
 * Purpose: Wall-clock port and UTC calendar decomposition for feeding the cron engine.
 * Scope: Clock interface, system implementation, ISO <-> calendar field conversion. Does not evaluate schedules.
 * Invariants: Decomposition is UTC; sub-second precision is dropped.
 * Side-effects: IO (SystemClock reads system time)
 * Links: src/probe.ts, @cronwork/cron-core
 * @public
 */

import type { CalendarInstant } from "@cronwork/cron-core";

export interface Clock {
  /**
   * Get current time as ISO 8601 string
   */
  now(): string;
}

export class SystemClock implements Clock {
  now(): string {
    return new Date().toISOString();
  }
}

export interface CalendarFields extends CalendarInstant {
  /** 0 = Sunday */
  readonly weekday: number;
}

export function decomposeUtc(iso: string): CalendarFields {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Invalid timestamp: ${iso}`);
  }
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hour: date.getUTCHours(),
    minute: date.getUTCMinutes(),
    second: date.getUTCSeconds(),
    weekday: date.getUTCDay(),
  };
}

export function composeUtc(instant: CalendarInstant): string {
  const date = new Date(
    Date.UTC(
      instant.year,
      instant.month - 1,
      instant.day,
      instant.hour,
      instant.minute,
      instant.second
    )
  );
  // Date.UTC maps years 0-99 onto 1900-1999
  date.setUTCFullYear(instant.year);
  return date.toISOString();
}
