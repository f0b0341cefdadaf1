import type { OtpError } from "../errors/otp-error.js";
import type { Result } from "../types/result.js";

/** Counter as accepted from callers; normalized by `toCounter` */
export type CounterInput = number | bigint;

/**
 * Port: HOTP generator (RFC 4226).
 * Immutable after construction; safe to share between callers.
 */
export interface HotpGenerator {
  readonly digits: number;
  readonly algorithm: string;
  /** Code for `counter`, left-zero padded to `digits` characters */
  generate(key: Uint8Array, counter: CounterInput): Result<string, OtpError>;
  /** `ok(false)` on mismatch; errors only when generation itself fails */
  validate(key: Uint8Array, code: string, counter: CounterInput): Result<boolean, OtpError>;
}
