// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cronwork/cron-core`
 * Purpose: Cron scheduling engine: parse expressions, match calendar instants, find next occurrences.
 * Scope: Re-exports parser, expression, calendar helpers, types and errors. Does not contain I/O or clock access.
 * Invariants: Pure domain logic only. Callers decompose timestamps into calendar fields themselves.
 * Side-effects: none
 * Links: src/parser.ts, src/expression.ts, src/next-occurrence.ts
 * @public
 */

// Calendar
export { dayOfWeek, daysInMonth, isLeapYear } from "./calendar";
// Errors
export {
  CronError,
  type CronErrorCode,
  type CronParseError,
  InvalidFieldCountError,
  InvalidFieldError,
  InvalidStepError,
  isCronError,
  isInvalidFieldCountError,
  isInvalidFieldError,
  isInvalidStepError,
  isOutOfRangeError,
  OutOfRangeError,
} from "./errors";
// Expression
export { CronExpression } from "./expression";
// Field matchers
export { ANY, fieldMatches, parseField } from "./field-matcher";
// Search
export { findNextOccurrence, SEARCH_HORIZON_YEARS } from "./next-occurrence";
// Parser
export { createCronParser, parse, parseWithSeconds } from "./parser";
// Types
export type {
  CalendarInstant,
  CronExpr,
  CronFields,
  CronParser,
  CronSchedule,
  FieldDomain,
  FieldMatcher,
  FieldName,
} from "./types";
export { FIELD_DOMAINS, FIELD_NAMES } from "./types";
