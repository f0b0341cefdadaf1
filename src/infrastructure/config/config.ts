import { z } from "zod";
import { type OtpError, invalidConfig } from "../../core/errors/otp-error.js";
import { type Result, err, ok } from "../../core/types/result.js";
import {
  DEFAULT_DIGITS,
  DEFAULT_EPOCH,
  DEFAULT_TIME_STEP,
  HASH_ALGORITHMS,
  MAX_DIGITS,
  MAX_TIME_STEP,
  MIN_DIGITS,
  issuesToDetails,
} from "./options.js";

/**
 * Package config — validated via Zod from environment variables.
 * Unset variables fall back to the RFC 4226 / RFC 6238 defaults.
 */
const configSchema = z.object({
  otp: z.object({
    digits: z.coerce.number().int().min(MIN_DIGITS).max(MAX_DIGITS).default(DEFAULT_DIGITS),
    algorithm: z.enum(HASH_ALGORITHMS).default("sha1"),
  }),

  window: z.object({
    epoch: z.coerce.number().int().safe().default(DEFAULT_EPOCH),
    timeStep: z.coerce.number().int().min(1).max(MAX_TIME_STEP).default(DEFAULT_TIME_STEP),
  }),

  log: z.object({
    level: z.enum(["debug", "info", "warn", "error", "fatal"]).default("info"),
    format: z.enum(["pretty", "json"]).default("pretty"),
  }),
});

export type OtpConfig = z.infer<typeof configSchema>;

export const loadConfig = (
  env: Readonly<Record<string, string | undefined>> = process.env,
): Result<OtpConfig, OtpError> => {
  const result = configSchema.safeParse({
    otp: {
      digits: env["OTP_DIGITS"],
      algorithm: env["OTP_ALGORITHM"],
    },
    window: {
      epoch: env["OTP_EPOCH"],
      timeStep: env["OTP_TIME_STEP"],
    },
    log: {
      level: env["LOG_LEVEL"],
      format: env["LOG_FORMAT"],
    },
  });

  if (!result.success) {
    return err(invalidConfig(issuesToDetails(result.error)));
  }

  return ok(result.data);
};
