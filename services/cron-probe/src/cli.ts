// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cronwork/cron-probe/cli`
 * Purpose: One probe run from raw env to an exit code.
 * Scope: Loads config, builds the run logger, runs the probe, writes the report line. Does not touch process state.
 * Invariants:
 *   - Returns 0 after writing exactly one JSON line
 *   - Returns 1 after a fatal entry on the boot logger for any failure, config errors included
 * Side-effects: IO (via injected write and loggers)
 * Links: src/main.ts, src/probe.ts
 * @public
 */

import type { Clock } from "./clock";
import { loadConfig } from "./config";
import { type Logger, makeLogger } from "./observability/logger";
import { runProbe } from "./probe";

export interface CliDeps {
  readonly env: Record<string, string | undefined>;
  readonly clock: Clock;
  readonly write: (line: string) => void;
  /** Built before config is read, so it cannot depend on it */
  readonly bootLogger: Logger;
}

export function runCli(deps: CliDeps): number {
  try {
    const config = loadConfig(deps.env);

    const logger = makeLogger({
      level: config.LOG_LEVEL,
      serviceName: config.SERVICE_NAME,
    });

    const report = runProbe(
      {
        expression: config.CRON_EXPRESSION,
        withSeconds: config.CRON_WITH_SECONDS,
        previewCount: config.CRON_PREVIEW_COUNT,
      },
      { clock: deps.clock, logger }
    );

    deps.write(`${JSON.stringify(report)}\n`);
    return 0;
  } catch (err) {
    deps.bootLogger.fatal({ err }, "cron probe failed");
    return 1;
  }
}
