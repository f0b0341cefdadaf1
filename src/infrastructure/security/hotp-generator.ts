import { type OtpError, internal } from "../../core/errors/otp-error.js";
import { formatCode } from "../../core/otp/code.js";
import { counterToBytes, toCounter } from "../../core/otp/counter.js";
import { truncate } from "../../core/otp/truncate.js";
import type { CounterInput, HotpGenerator } from "../../core/ports/hotp-generator.js";
import type { HashAlgorithm, KeyedHash } from "../../core/ports/keyed-hash.js";
import type { Logger } from "../../core/ports/logger.js";
import { type Result, err, ok, tryCatch } from "../../core/types/result.js";
import { timingSafeEqual } from "../../shared/utils/timing-safe.js";
import { MAX_UNIFORM_DIGITS, parseHotpOptions } from "../config/options.js";
import { createNodeKeyedHash } from "../crypto/node-keyed-hash.js";
import { createNoopLogger } from "../logging/logger.js";

export interface HotpOptions {
  /** Code length, 1..10. Default: 6 */
  readonly digits?: number;
  /** Default: "sha1" */
  readonly algorithm?: HashAlgorithm;
  /** Overrides `algorithm` with a caller-supplied primitive */
  readonly hash?: KeyedHash;
  readonly logger?: Logger;
}

/**
 * HOTP (RFC 4226) generator.
 * Options are validated once here; the returned object is frozen.
 */
export const createHotpGenerator = (options: HotpOptions = {}): Result<HotpGenerator, OtpError> => {
  const parsed = parseHotpOptions({ digits: options.digits, algorithm: options.algorithm });
  if (!parsed.ok) return parsed;

  const { digits } = parsed.value;
  const hash = options.hash ?? createNodeKeyedHash(parsed.value.algorithm);
  const log = (options.logger ?? createNoopLogger()).child({ component: "hotp" });

  if (digits > MAX_UNIFORM_DIGITS) {
    log.warn("Digit count exceeds the truncated range; codes are bounded by 2^31", { digits });
  }
  log.debug("HOTP generator ready", { digits, algorithm: hash.algorithm });

  const generate = (key: Uint8Array, counter: CounterInput): Result<string, OtpError> => {
    const normalized = toCounter(counter);
    if (!normalized.ok) return normalized;

    const digest = tryCatch(() => hash.digest(key, counterToBytes(normalized.value)));
    if (!digest.ok) return err(internal("Keyed hash failed", digest.error));

    const bin = truncate(digest.value);
    if (!bin.ok) return bin;

    return ok(formatCode(bin.value, digits));
  };

  const validate = (
    key: Uint8Array,
    code: string,
    counter: CounterInput,
  ): Result<boolean, OtpError> => {
    const expected = generate(key, counter);
    if (!expected.ok) return expected;

    const matches = timingSafeEqual(code, expected.value);
    if (!matches) log.debug("Code mismatch", { counter });
    return ok(matches);
  };

  return ok(
    Object.freeze({
      digits,
      algorithm: hash.algorithm,
      generate,
      validate,
    }),
  );
};
