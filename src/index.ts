/**
 * Public entry point.
 *
 * @example
 * const hotp = createHotpGenerator({ digits: 6 });
 * const window = createTimeWindow({ timeStep: 30 });
 * if (hotp.ok && window.ok) {
 *   const counter = window.value.at(new Date());
 *   if (counter.ok) hotp.value.generate(key, counter.value);
 * }
 */
export * from "./core/index.js";
export * from "./infrastructure/index.js";
export { bootstrap, type OtpStack } from "./main.js";
