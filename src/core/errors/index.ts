export {
  type OtpError,
  OtpErrorCode,
  otpError,
  invalidConfig,
  invalidCounter,
  invalidTimestamp,
  timestampBeforeEpoch,
  digestTooShort,
  internal,
  isOtpError,
} from "./otp-error.js";
