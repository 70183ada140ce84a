// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cronwork/cron-probe/tests/fixtures`
 * Purpose: Deterministic clock and log capture for cron-probe unit tests.
 * Scope: FakeClock and an in-memory pino logger. Does not replace system Date globally.
 * Invariants: Time advances only via explicit calls; captured log lines are parsed JSON.
 * Side-effects: none
 * Links: tests/*.test.ts
 * @internal
 */

import pino from "pino";

import type { Clock, Logger } from "../src";

export class FakeClock implements Clock {
  private currentTime: Date;

  constructor(initialTime: string | Date = "2024-01-01T00:00:00.000Z") {
    this.currentTime = new Date(initialTime);
  }

  now(): string {
    return this.currentTime.toISOString();
  }

  advance(milliseconds: number): void {
    this.currentTime = new Date(this.currentTime.getTime() + milliseconds);
  }

  setTime(time: string | Date): void {
    this.currentTime = new Date(time);
  }
}

export interface CapturedLogs {
  readonly logger: Logger;
  entries(): unknown[];
}

/**
 * Pino logger at debug level writing JSON lines into memory.
 */
export function captureLogs(): CapturedLogs {
  const lines: string[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(msg: string) {
        lines.push(msg);
      },
    }
  );
  return {
    logger,
    entries: () => lines.map((line): unknown => JSON.parse(line)),
  };
}
