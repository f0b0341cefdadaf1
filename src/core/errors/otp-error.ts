/**
 * Canonical OTP error — every failure in the package is expressed as an
 * OtpError so callers and the logging layer have a single shape.
 */

export const OtpErrorCode = {
  // Construction
  INVALID_CONFIG: "INVALID_CONFIG",
  // Call arguments
  INVALID_COUNTER: "INVALID_COUNTER",
  INVALID_TIMESTAMP: "INVALID_TIMESTAMP",
  TIMESTAMP_BEFORE_EPOCH: "TIMESTAMP_BEFORE_EPOCH",
  // Keyed hash
  DIGEST_TOO_SHORT: "DIGEST_TOO_SHORT",
  INTERNAL: "INTERNAL",
} as const;

export type OtpErrorCode = (typeof OtpErrorCode)[keyof typeof OtpErrorCode];

export interface OtpError {
  readonly code: OtpErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;
}

/** Factory helpers */
export const otpError = (
  code: OtpErrorCode,
  message: string,
  details?: Record<string, unknown>,
  cause?: unknown,
): OtpError => {
  const error: OtpError = { code, message };
  if (details !== undefined) {
    return cause !== undefined ? { ...error, details, cause } : { ...error, details };
  }
  if (cause !== undefined) {
    return { ...error, cause };
  }
  return error;
};

export const invalidConfig = (details: Record<string, unknown>): OtpError =>
  otpError(OtpErrorCode.INVALID_CONFIG, "Invalid configuration", details);

export const invalidCounter = (value: number | bigint): OtpError =>
  otpError(OtpErrorCode.INVALID_COUNTER, "Counter must be an unsigned 64-bit integer", {
    value: String(value),
  });

export const invalidTimestamp = (value: string): OtpError =>
  otpError(OtpErrorCode.INVALID_TIMESTAMP, "Timestamp must be a finite point in time", { value });

export const timestampBeforeEpoch = (seconds: bigint, epoch: number): OtpError =>
  otpError(OtpErrorCode.TIMESTAMP_BEFORE_EPOCH, "Timestamp precedes the configured epoch", {
    seconds: String(seconds),
    epoch,
  });

export const digestTooShort = (length: number, required: number): OtpError =>
  otpError(OtpErrorCode.DIGEST_TOO_SHORT, `Digest must be at least ${required} bytes`, {
    length,
    required,
  });

export const internal = (msg = "Internal error", cause?: unknown): OtpError =>
  otpError(OtpErrorCode.INTERNAL, msg, undefined, cause);

const CODES: ReadonlySet<string> = new Set(Object.values(OtpErrorCode));

export const isOtpError = (value: unknown): value is OtpError =>
  typeof value === "object" &&
  value !== null &&
  "code" in value &&
  "message" in value &&
  typeof value.code === "string" &&
  CODES.has(value.code) &&
  typeof value.message === "string";
