import type { OtpError } from "../../core/errors/otp-error.js";
import type { TimeInput } from "../../core/ports/time-window.js";
import type { TotpGenerator } from "../../core/ports/totp-generator.js";
import type { Counter } from "../../core/types/brand.js";
import { type Result, ok } from "../../core/types/result.js";
import { type HotpOptions, createHotpGenerator } from "./hotp-generator.js";
import { type TimeWindowOptions, createTimeWindow } from "./time-window.js";

export interface TotpOptions extends HotpOptions, TimeWindowOptions {
  /** Source of "now" when a call omits `time`. Default: `() => new Date()` */
  readonly clock?: () => Date;
}

/**
 * TOTP (RFC 6238): an HOTP generator fed by a time window.
 * Only the current window is checked; there is no drift tolerance.
 */
export const createTotpGenerator = (options: TotpOptions = {}): Result<TotpGenerator, OtpError> => {
  const hotpResult = createHotpGenerator(options);
  if (!hotpResult.ok) return hotpResult;
  const windowResult = createTimeWindow(options);
  if (!windowResult.ok) return windowResult;

  const generator = hotpResult.value;
  const timeWindow = windowResult.value;
  const clock = options.clock ?? (() => new Date());

  const counterAt = (time: TimeInput = clock()): Result<Counter, OtpError> => timeWindow.at(time);

  const generate = (key: Uint8Array, time: TimeInput = clock()): Result<string, OtpError> => {
    const counter = counterAt(time);
    return counter.ok ? generator.generate(key, counter.value) : counter;
  };

  const validate = (
    key: Uint8Array,
    code: string,
    time: TimeInput = clock(),
  ): Result<boolean, OtpError> => {
    const counter = counterAt(time);
    return counter.ok ? generator.validate(key, code, counter.value) : counter;
  };

  const remaining = (time: TimeInput = clock()): Result<number, OtpError> =>
    timeWindow.remaining(time);

  return ok(
    Object.freeze({
      digits: generator.digits,
      algorithm: generator.algorithm,
      epoch: timeWindow.epoch,
      timeStep: timeWindow.timeStep,
      generate,
      validate,
      counterAt,
      remaining,
    }),
  );
};
