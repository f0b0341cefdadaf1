import { type OtpError, digestTooShort } from "../errors/otp-error.js";
import { type Result, err, ok } from "../types/result.js";

/** The last nibble selects offsets 0..15, each reading 4 bytes */
export const MIN_DIGEST_BYTES = 20;

/**
 * Dynamic truncation (RFC 4226 §5.3).
 * Returns the 31-bit value before the `mod 10^digits` reduction.
 */
export const truncate = (digest: Uint8Array): Result<number, OtpError> => {
  if (digest.byteLength < MIN_DIGEST_BYTES) {
    return err(digestTooShort(digest.byteLength, MIN_DIGEST_BYTES));
  }
  const view = new DataView(digest.buffer, digest.byteOffset, digest.byteLength);
  const offset = view.getUint8(digest.byteLength - 1) & 0x0f;
  return ok(view.getUint32(offset, false) & 0x7fff_ffff);
};
