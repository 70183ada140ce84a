// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cronwork/cron-core/parser`
 * Purpose: Builds CronExpression values from 5-field and 6-field source strings.
 * Scope: Field splitting, field-count checks and left-to-right field parsing. Does not evaluate schedules.
 * Invariants:
 * - Field count is checked before any field is parsed
 * - First field error aborts the parse; no partial expression is returned
 * - 5-field form pins seconds to {0}
 * Side-effects: none
 * Links: src/field-matcher.ts, src/expression.ts
 * @public
 */

import { InvalidFieldCountError } from "./errors";
import { CronExpression } from "./expression";
import { parseField, valuesMatcher } from "./field-matcher";
import type { CronParser } from "./types";

const AT_SECOND_ZERO = valuesMatcher([0]);

/**
 * Parse `minute hour day month weekday`.
 * @throws CronError
 */
export function parse(text: string): CronExpression {
  const tokens = splitFields(text);
  if (tokens.length !== 5) {
    throw new InvalidFieldCountError("5", tokens.length);
  }
  const [minute, hour, day, month, weekday] = tokens;

  return new CronExpression(text, {
    second: AT_SECOND_ZERO,
    minute: parseField(minute, "minute"),
    hour: parseField(hour, "hour"),
    day: parseField(day, "day"),
    month: parseField(month, "month"),
    weekday: parseField(weekday, "weekday"),
  });
}

/**
 * Parse `second minute hour day month weekday`.
 * @throws CronError
 */
export function parseWithSeconds(text: string): CronExpression {
  const tokens = splitFields(text);
  if (tokens.length !== 6) {
    throw new InvalidFieldCountError("6", tokens.length);
  }
  const [second, minute, hour, day, month, weekday] = tokens;

  return new CronExpression(text, {
    second: parseField(second, "second"),
    minute: parseField(minute, "minute"),
    hour: parseField(hour, "hour"),
    day: parseField(day, "day"),
    month: parseField(month, "month"),
    weekday: parseField(weekday, "weekday"),
  });
}

/** Stateless parser object for callers that take a CronParser dependency. */
export function createCronParser(): CronParser<CronExpression> {
  return Object.freeze({ parse, parseWithSeconds });
}

function splitFields(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}
