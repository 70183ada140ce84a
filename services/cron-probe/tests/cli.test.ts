// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cronwork/cron-probe/tests/cli`
 * Purpose: Unit tests for runCli exit codes, report output and fatal logging.
 * Scope: Success path and config/parse failures. Uses FakeClock and captured logs; no process state.
 * Invariants: Every failure yields exit code 1 and one fatal entry carrying the cause.
 * Side-effects: none
 * Links: src/cli.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { runCli } from "../src";
import { captureLogs, FakeClock } from "./fixtures";

function setup(env: Record<string, string | undefined>) {
  const { logger, entries } = captureLogs();
  const written: string[] = [];
  const exitCode = runCli({
    env,
    clock: new FakeClock("2024-01-01T08:00:00.000Z"),
    write: (line) => {
      written.push(line);
    },
    bootLogger: logger,
  });
  return { exitCode, written, entries };
}

describe("runCli", () => {
  it("writes one JSON report line and returns 0", () => {
    const { exitCode, written, entries } = setup({
      CRON_EXPRESSION: "0 12 * * *",
      CRON_PREVIEW_COUNT: "1",
    });

    expect(exitCode).toBe(0);
    expect(written).toEqual([
      '{"expression":"0 12 * * *","evaluatedAt":"2024-01-01T08:00:00.000Z","dueNow":false,"upcoming":["2024-01-01T12:00:00.000Z"]}\n',
    ]);
    expect(entries()).toEqual([]);
  });

  it("logs the config error as fatal when LOG_LEVEL is invalid", () => {
    const { exitCode, written, entries } = setup({
      CRON_EXPRESSION: "* * * * *",
      LOG_LEVEL: "loud",
    });

    expect(exitCode).toBe(1);
    expect(written).toEqual([]);
    expect(entries()).toEqual([
      expect.objectContaining({
        level: 60,
        msg: "cron probe failed",
        err: expect.objectContaining({
          message: expect.stringContaining("\n  LOG_LEVEL: "),
        }),
      }),
    ]);
  });

  it("logs a rejected expression as fatal", () => {
    const { exitCode, entries } = setup({ CRON_EXPRESSION: "60 * * * *" });

    expect(exitCode).toBe(1);
    expect(entries()).toContainEqual(
      expect.objectContaining({
        level: 60,
        err: expect.objectContaining({
          type: "OutOfRangeError",
          message: "minute value 60 out of range (0-59)",
        }),
      })
    );
  });
});
