export { createHotpGenerator, type HotpOptions } from "./hotp-generator.js";
export { createTimeWindow, type TimeWindowOptions } from "./time-window.js";
export { createTotpGenerator, type TotpOptions } from "./totp-generator.js";
