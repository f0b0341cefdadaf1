export { loadConfig, type OtpConfig } from "./config.js";
export {
  hotpOptionsSchema,
  timeWindowOptionsSchema,
  parseHotpOptions,
  parseTimeWindowOptions,
  type HotpSettings,
  type TimeWindowSettings,
  DEFAULT_DIGITS,
  DEFAULT_EPOCH,
  DEFAULT_TIME_STEP,
  MAX_DIGITS,
  MAX_UNIFORM_DIGITS,
} from "./options.js";
