// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cronwork/cron-probe/main`
 * Purpose: CLI entry point. Wires process env, system clock and stdout into runCli.
 * Scope: Process lifecycle (exit codes) only. Does not contain schedule logic.
 * Invariants:
 *   - Boot logger is created before env is read, at a fixed level
 *   - Exit 0 on success, 1 after a fatal log on any failure
 * Side-effects: IO (process.env, system clock, stdout, stderr)
 * Links: src/cli.ts
 * @public
 */

import { runCli } from "./cli";
import { SystemClock } from "./clock";
import { flushLogger, makeLogger } from "./observability/logger";

const bootLogger = makeLogger({ level: "info", bindings: { phase: "boot" } });

const exitCode = runCli({
  env: process.env,
  clock: new SystemClock(),
  write: (line) => {
    process.stdout.write(line);
  },
  bootLogger,
});

flushLogger();
process.exit(exitCode);
