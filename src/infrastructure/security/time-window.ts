import { type OtpError, timestampBeforeEpoch } from "../../core/errors/otp-error.js";
import { toCounter } from "../../core/otp/counter.js";
import { toUnixSeconds } from "../../core/otp/time.js";
import type { Logger } from "../../core/ports/logger.js";
import type { TimeInput, TimeWindow } from "../../core/ports/time-window.js";
import type { Counter } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { parseTimeWindowOptions } from "../config/options.js";
import { createNoopLogger } from "../logging/logger.js";

export interface TimeWindowOptions {
  /**
   * T0 in Unix seconds, limited to the safe-integer range
   * (±2^53 − 1, far beyond any representable Date). Default: 0
   */
  readonly epoch?: number;
  /** X in whole seconds. Default: 30 */
  readonly timeStep?: number;
  readonly logger?: Logger;
}

/**
 * RFC 6238 time window: T = floor((now - T0) / X).
 * Times before T0 are rejected rather than wrapped.
 */
export const createTimeWindow = (options: TimeWindowOptions = {}): Result<TimeWindow, OtpError> => {
  const parsed = parseTimeWindowOptions({ epoch: options.epoch, timeStep: options.timeStep });
  if (!parsed.ok) return parsed;

  const { epoch, timeStep } = parsed.value;
  const epochSeconds = BigInt(epoch);
  const step = BigInt(timeStep);

  (options.logger ?? createNoopLogger())
    .child({ component: "time-window" })
    .debug("Time window ready", { epoch, timeStep });

  const elapsed = (time: TimeInput): Result<bigint, OtpError> => {
    const seconds = toUnixSeconds(time);
    if (!seconds.ok) return seconds;
    if (seconds.value < epochSeconds) return err(timestampBeforeEpoch(seconds.value, epoch));
    return ok(seconds.value - epochSeconds);
  };

  const at = (time: TimeInput): Result<Counter, OtpError> => {
    const since = elapsed(time);
    if (!since.ok) return since;
    return toCounter(since.value / step);
  };

  const remaining = (time: TimeInput): Result<number, OtpError> => {
    const since = elapsed(time);
    if (!since.ok) return since;
    return ok(Number(step - (since.value % step)));
  };

  return ok(Object.freeze({ epoch, timeStep, at, remaining }));
};
