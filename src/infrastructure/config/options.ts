import { z } from "zod";
import { type OtpError, invalidConfig } from "../../core/errors/otp-error.js";
import type { HashAlgorithm } from "../../core/ports/keyed-hash.js";
import { type Result, err, ok } from "../../core/types/result.js";

export const HASH_ALGORITHMS = [
  "sha1",
  "sha256",
  "sha512",
] as const satisfies readonly HashAlgorithm[];

export const DEFAULT_DIGITS = 6;
export const MIN_DIGITS = 1;
/** 2^31 has ten digits; past that the padding only adds leading zeros */
export const MAX_DIGITS = 10;
/** Above this, 10^digits exceeds the 31-bit truncated range */
export const MAX_UNIFORM_DIGITS = 9;

export const DEFAULT_EPOCH = 0;
export const DEFAULT_TIME_STEP = 30;
export const MAX_TIME_STEP = 0xffff_ffff;

export const hotpOptionsSchema = z.object({
  digits: z.number().int().min(MIN_DIGITS).max(MAX_DIGITS).default(DEFAULT_DIGITS),
  algorithm: z.enum(HASH_ALGORITHMS).default("sha1"),
});

export const timeWindowOptionsSchema = z.object({
  epoch: z.number().int().safe().default(DEFAULT_EPOCH),
  timeStep: z.number().int().min(1).max(MAX_TIME_STEP).default(DEFAULT_TIME_STEP),
});

export type HotpSettings = z.infer<typeof hotpOptionsSchema>;
export type TimeWindowSettings = z.infer<typeof timeWindowOptionsSchema>;

/** Flatten zod issues into `{ "a.b": "message" }` */
export const issuesToDetails = (error: z.ZodError): Record<string, string> => {
  const details: Record<string, string> = {};
  for (const issue of error.issues) {
    const path = issue.path.join(".") || "_";
    details[path] ??= issue.message;
  }
  return details;
};

export const parseHotpOptions = (
  input: z.input<typeof hotpOptionsSchema>,
): Result<HotpSettings, OtpError> => {
  const result = hotpOptionsSchema.safeParse(input);
  return result.success ? ok(result.data) : err(invalidConfig(issuesToDetails(result.error)));
};

export const parseTimeWindowOptions = (
  input: z.input<typeof timeWindowOptionsSchema>,
): Result<TimeWindowSettings, OtpError> => {
  const result = timeWindowOptionsSchema.safeParse(input);
  return result.success ? ok(result.data) : err(invalidConfig(issuesToDetails(result.error)));
};
