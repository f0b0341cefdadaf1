export {
  loadConfig,
  type OtpConfig,
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
} from "./config/index.js";
export { createLogger, createNoopLogger, type LogFormat } from "./logging/index.js";
export { createNodeKeyedHash } from "./crypto/index.js";
export {
  createHotpGenerator,
  createTimeWindow,
  createTotpGenerator,
  type HotpOptions,
  type TimeWindowOptions,
  type TotpOptions,
} from "./security/index.js";
