import { type OtpError, invalidCounter } from "../errors/otp-error.js";
import { type Counter, brand } from "../types/brand.js";
import { type Result, err, ok } from "../types/result.js";

export const MAX_COUNTER = 0xffff_ffff_ffff_ffffn;

/** Normalize a caller-supplied moving factor into the uint64 range */
export const toCounter = (value: number | bigint): Result<Counter, OtpError> => {
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value) || value < 0) return err(invalidCounter(value));
    return ok(brand<bigint, "Counter">(BigInt(value)));
  }
  if (value < 0n || value > MAX_COUNTER) return err(invalidCounter(value));
  return ok(brand<bigint, "Counter">(value));
};

/** Serialize a counter as 8 bytes in network byte order (RFC 4226 §5.2) */
export const counterToBytes = (counter: Counter): Uint8Array => {
  const buf = new Uint8Array(8);
  new DataView(buf.buffer).setBigUint64(0, counter, false);
  return buf;
};
