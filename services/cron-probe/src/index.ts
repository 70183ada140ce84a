// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cronwork/cron-probe`
 * Purpose: Probe package exports.
 * Scope: Re-exports probe runner, clock port, config loader and logger factories. Does not contain implementations.
 * Invariants: Importing this module starts nothing; src/main.ts is the only entry with side-effects.
 * Side-effects: none
 * Links: src/main.ts
 * @public
 */

export { type CliDeps, runCli } from "./cli";
export {
  type CalendarFields,
  type Clock,
  composeUtc,
  decomposeUtc,
  SystemClock,
} from "./clock";
export { type Config, loadConfig } from "./config";
export {
  flushLogger,
  type Logger,
  type LoggerOptions,
  makeLogger,
  makeNoopLogger,
  resolveLoggerOptions,
} from "./observability/logger";
export {
  type ProbeDeps,
  type ProbeReport,
  type ProbeRequest,
  runProbe,
} from "./probe";
