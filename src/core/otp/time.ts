import { type OtpError, invalidTimestamp } from "../errors/otp-error.js";
import { type Result, err, ok } from "../types/result.js";
import type { TimeInput } from "../ports/time-window.js";

/** Whole Unix seconds for a time input; sub-second precision is floored away */
export const toUnixSeconds = (time: TimeInput): Result<bigint, OtpError> => {
  if (typeof time === "bigint") return ok(time);
  const seconds = time instanceof Date ? time.getTime() / 1000 : time;
  if (!Number.isFinite(seconds)) return err(invalidTimestamp(String(time)));
  return ok(BigInt(Math.floor(seconds)));
};
