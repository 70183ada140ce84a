// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cronwork/cron-probe/config`
 * Purpose: Environment configuration with Zod validation.
 * Scope: Reads and validates env vars on startup. Does not contain runtime logic.
 * Invariants:
 * - CRON_EXPRESSION required
 * - Fails fast listing every invalid key
 * Side-effects: Reads process.env (default source)
 * Links: src/main.ts
 * @internal
 */

import { z } from "zod";

const EnvSchema = z.object({
  /** Schedule to evaluate (required) */
  CRON_EXPRESSION: z.string().trim().min(1, "CRON_EXPRESSION is required"),

  /** Parse CRON_EXPRESSION as the 6-field form with seconds (default: false) */
  CRON_WITH_SECONDS: z
    .enum(["true", "false"])
    .default("false")
    .transform((v) => v === "true"),

  /** How many upcoming occurrences to report (default: 5) */
  CRON_PREVIEW_COUNT: z.coerce.number().int().min(1).max(100).default(5),

  /** Log level (default: info) */
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  /** Service name for logging (default: cron-probe) */
  SERVICE_NAME: z.string().default("cron-probe"),
});

export type Config = z.infer<typeof EnvSchema>;

/**
 * Loads and validates configuration from environment.
 * Throws on invalid config with clear error messages.
 */
export function loadConfig(
  source: Record<string, string | undefined> = process.env
): Config {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${errors}`);
  }
  return result.data;
}
