// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cronwork/cron-core/errors`
 * Purpose: Domain error classes for cron expression parsing.
 * Scope: Error definitions and type guards. Does not perform I/O or contain parsing logic.
 * Invariants: All errors extend CronError and have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * Links: src/parser.ts, src/field-matcher.ts
 * @public
 */

import type { FieldName } from "./types";

export type CronErrorCode =
  | "INVALID_FIELD_COUNT"
  | "INVALID_FIELD"
  | "OUT_OF_RANGE"
  | "INVALID_STEP";

export abstract class CronError extends Error {
  public abstract readonly code: CronErrorCode;
}

export class InvalidFieldCountError extends CronError {
  public readonly code = "INVALID_FIELD_COUNT" as const;
  constructor(
    public readonly expected: "5" | "6",
    public readonly got: number
  ) {
    super(`invalid field count: expected ${expected}, got ${got}`);
    this.name = "InvalidFieldCountError";
  }
}

export class InvalidFieldError extends CronError {
  public readonly code = "INVALID_FIELD" as const;
  constructor(
    public readonly field: FieldName,
    public readonly value: string,
    public readonly reason: string
  ) {
    super(`invalid ${field} field '${value}': ${reason}`);
    this.name = "InvalidFieldError";
  }
}

export class OutOfRangeError extends CronError {
  public readonly code = "OUT_OF_RANGE" as const;
  constructor(
    public readonly field: FieldName,
    public readonly value: number,
    public readonly min: number,
    public readonly max: number
  ) {
    super(`${field} value ${value} out of range (${min}-${max})`);
    this.name = "OutOfRangeError";
  }
}

export class InvalidStepError extends CronError {
  public readonly code = "INVALID_STEP" as const;
  constructor(
    public readonly field: FieldName,
    public readonly step: number
  ) {
    super(`invalid step ${step} for ${field} field`);
    this.name = "InvalidStepError";
  }
}

export type CronParseError =
  | InvalidFieldCountError
  | InvalidFieldError
  | OutOfRangeError
  | InvalidStepError;

// Type guards

export function isCronError(error: unknown): error is CronParseError {
  return error instanceof CronError;
}

export function isInvalidFieldCountError(
  error: unknown
): error is InvalidFieldCountError {
  return error instanceof Error && error.name === "InvalidFieldCountError";
}

export function isInvalidFieldError(
  error: unknown
): error is InvalidFieldError {
  return error instanceof Error && error.name === "InvalidFieldError";
}

export function isOutOfRangeError(error: unknown): error is OutOfRangeError {
  return error instanceof Error && error.name === "OutOfRangeError";
}

export function isInvalidStepError(error: unknown): error is InvalidStepError {
  return error instanceof Error && error.name === "InvalidStepError";
}
