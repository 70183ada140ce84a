// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cronwork/cron-probe/probe`
 * Purpose: Evaluates one cron schedule against the current time and previews its upcoming occurrences.
 * Scope: Parses via @cronwork/cron-core, asks matches/nextAfter, logs outcomes. Does not execute or dispatch jobs.
 * Invariants:
 * - All clock access goes through the injected Clock
 * - Parse failures are logged with their error code and rethrown
 * - Preview stops early when the engine finds no further occurrence
 * Side-effects: IO (log entries via provided logger)
 * Links: src/clock.ts, src/main.ts
 * @public
 */

import {
  type CalendarInstant,
  type CronExpression,
  isCronError,
  parse,
  parseWithSeconds,
} from "@cronwork/cron-core";

import { type Clock, composeUtc, decomposeUtc } from "./clock";
import type { Logger } from "./observability/logger";

export interface ProbeRequest {
  readonly expression: string;
  readonly withSeconds: boolean;
  readonly previewCount: number;
}

export interface ProbeDeps {
  readonly clock: Clock;
  readonly logger: Logger;
}

export interface ProbeReport {
  readonly expression: string;
  readonly evaluatedAt: string;
  readonly dueNow: boolean;
  readonly upcoming: readonly string[];
}

export function runProbe(request: ProbeRequest, deps: ProbeDeps): ProbeReport {
  const log = deps.logger.child({ expression: request.expression });
  const expr = parseExpression(request, log);

  const evaluatedAt = deps.clock.now();
  const now = decomposeUtc(evaluatedAt);
  const dueNow = expr.matches(
    now.second,
    now.minute,
    now.hour,
    now.day,
    now.month,
    now.weekday
  );

  const upcoming: string[] = [];
  let cursor: CalendarInstant = now;
  while (upcoming.length < request.previewCount) {
    const next = expr.nextAfter(
      cursor.year,
      cursor.month,
      cursor.day,
      cursor.hour,
      cursor.minute,
      cursor.second
    );
    if (next === null) {
      log.debug(
        { found: upcoming.length, requested: request.previewCount },
        "no further occurrence within search horizon"
      );
      break;
    }
    upcoming.push(composeUtc(next));
    cursor = next;
  }

  log.info(
    { evaluatedAt, dueNow, upcoming: upcoming.length },
    "probe complete"
  );
  return { expression: expr.asString(), evaluatedAt, dueNow, upcoming };
}

function parseExpression(request: ProbeRequest, log: Logger): CronExpression {
  try {
    return request.withSeconds
      ? parseWithSeconds(request.expression)
      : parse(request.expression);
  } catch (err) {
    if (isCronError(err)) {
      log.warn({ errorCode: err.code, err }, "cron expression rejected");
    }
    throw err;
  }
}
