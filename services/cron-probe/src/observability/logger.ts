// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cronwork/cron-probe/observability/logger`
 * Purpose: Pino logger factory - JSON-only stderr emission.
 * Scope: Create configured pino loggers. Does not format output.
 * Invariants: Always emits JSON to stderr (stdout carries the probe report); silenced under Vitest or NODE_ENV=test.
 * Side-effects: none
 * Notes: Use makeLogger in the composition root; use makeNoopLogger for tests. Pipe to pino-pretty for humans.
 * Links: src/main.ts
 * @public
 */

import type { Logger, LoggerOptions as PinoOptions } from "pino";
import pino from "pino";

export type { Logger } from "pino";

export interface LoggerOptions {
  readonly level?: string;
  readonly serviceName?: string;
  readonly bindings?: Record<string, unknown>;
}

type Destination = ReturnType<typeof pino.destination>;

const DEFAULT_LEVEL = "info";

let destination: Destination | undefined;

/**
 * Pino options for the given caller options and environment.
 * Unknown levels fall back to "info"; config errors must still reach the log.
 */
export function resolveLoggerOptions(
  options: LoggerOptions = {},
  env: Record<string, string | undefined> = process.env
): PinoOptions {
  const isVitest = env.VITEST === "true";
  const nodeEnv = env.NODE_ENV ?? "development";

  return {
    level: knownLevel(options.level ?? env.LOG_LEVEL),
    enabled: !(isVitest || nodeEnv === "test"),
    // bindings first so reserved keys win
    base: {
      ...options.bindings,
      app: "cronwork",
      service: options.serviceName ?? "cron-probe",
    },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

export function makeLogger(options: LoggerOptions = {}): Logger {
  destination ??= pino.destination({ dest: 2, sync: true });
  return pino(resolveLoggerOptions(options), destination);
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

export function flushLogger(): void {
  destination?.flushSync();
}

function knownLevel(level: string | undefined): string {
  if (level === undefined) {
    return DEFAULT_LEVEL;
  }
  const normalized = level.trim().toLowerCase();
  return normalized === "silent" || normalized in pino.levels.values
    ? normalized
    : DEFAULT_LEVEL;
}
