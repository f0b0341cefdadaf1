import type { OtpError } from "../errors/otp-error.js";
import type { Counter } from "../types/brand.js";
import type { Result } from "../types/result.js";
import type { TimeInput } from "./time-window.js";

/**
 * Port: TOTP generator — an HOTP generator driven by a time window.
 * Every `time` argument defaults to the generator's clock.
 */
export interface TotpGenerator {
  readonly digits: number;
  readonly algorithm: string;
  readonly epoch: number;
  readonly timeStep: number;
  generate(key: Uint8Array, time?: TimeInput): Result<string, OtpError>;
  validate(key: Uint8Array, code: string, time?: TimeInput): Result<boolean, OtpError>;
  counterAt(time?: TimeInput): Result<Counter, OtpError>;
  remaining(time?: TimeInput): Result<number, OtpError>;
}
