// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cronwork/cron-probe/tests/clock`
 * Purpose: Unit tests for the system clock and UTC calendar decomposition.
 * Scope: SystemClock, decomposeUtc, composeUtc. Does not test schedule evaluation.
 * Invariants: Deterministic tests with mocked system time.
 * Side-effects: none
 * Links: src/clock.ts
 * @internal
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { composeUtc, decomposeUtc, SystemClock } from "../src";
import { FakeClock } from "./fixtures";

describe("SystemClock", () => {
  const MOCK_DATE = new Date("2025-01-15T10:30:00.000Z");

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(MOCK_DATE);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the system time as ISO 8601", () => {
    expect(new SystemClock().now()).toBe("2025-01-15T10:30:00.000Z");
  });
});

describe("FakeClock", () => {
  it("advances only when told to", () => {
    const clock = new FakeClock("2024-01-01T00:00:00.000Z");
    clock.advance(90_000);
    expect(clock.now()).toBe("2024-01-01T00:01:30.000Z");
    clock.setTime("2024-06-01T12:00:00.000Z");
    expect(clock.now()).toBe("2024-06-01T12:00:00.000Z");
  });
});

describe("decomposeUtc", () => {
  it("splits an ISO timestamp into UTC calendar fields", () => {
    expect(decomposeUtc("2024-12-25T13:45:30.999Z")).toEqual({
      year: 2024,
      month: 12,
      day: 25,
      hour: 13,
      minute: 45,
      second: 30,
      weekday: 3,
    });
  });

  it("converts offsets to UTC", () => {
    const fields = decomposeUtc("2024-01-01T01:00:00+02:00");
    expect(fields.year).toBe(2023);
    expect(fields.month).toBe(12);
    expect(fields.day).toBe(31);
    expect(fields.hour).toBe(23);
    expect(fields.weekday).toBe(0);
  });

  it("rejects unparseable input", () => {
    expect(() => decomposeUtc("not-a-date")).toThrow(
      "Invalid timestamp: not-a-date"
    );
  });
});

describe("composeUtc", () => {
  it("formats a calendar instant as ISO 8601", () => {
    expect(
      composeUtc({
        year: 2024,
        month: 2,
        day: 29,
        hour: 23,
        minute: 59,
        second: 59,
      })
    ).toBe("2024-02-29T23:59:59.000Z");
  });

  it("keeps two-digit years literal", () => {
    expect(
      composeUtc({ year: 50, month: 1, day: 1, hour: 0, minute: 0, second: 0 })
    ).toBe("0050-01-01T00:00:00.000Z");
  });
});
