import type { OtpError } from "../errors/otp-error.js";
import type { Counter } from "../types/brand.js";
import type { Result } from "../types/result.js";

/** A point in time: a Date, or Unix seconds */
export type TimeInput = Date | number | bigint;

/**
 * Port: Time window (RFC 6238) — maps wall-clock time to a moving factor.
 */
export interface TimeWindow {
  /** T0, in Unix seconds */
  readonly epoch: number;
  /** X, in seconds */
  readonly timeStep: number;
  at(time: TimeInput): Result<Counter, OtpError>;
  /** Seconds left before `at(time)` advances, in [1, timeStep] */
  remaining(time: TimeInput): Result<number, OtpError>;
}
