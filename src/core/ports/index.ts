export type { Logger, LogLevel } from "./logger.js";
export type { HashAlgorithm, KeyedHash } from "./keyed-hash.js";
export type { HotpGenerator, CounterInput } from "./hotp-generator.js";
export type { TimeWindow, TimeInput } from "./time-window.js";
export type { TotpGenerator } from "./totp-generator.js";
