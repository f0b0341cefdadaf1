import type { OtpError } from "./core/errors/otp-error.js";
import type { HotpGenerator } from "./core/ports/hotp-generator.js";
import type { Logger } from "./core/ports/logger.js";
import type { TimeWindow } from "./core/ports/time-window.js";
import type { TotpGenerator } from "./core/ports/totp-generator.js";
import { type Result, ok } from "./core/types/result.js";
import { type OtpConfig, loadConfig } from "./infrastructure/config/config.js";
import { createLogger } from "./infrastructure/logging/logger.js";
import { createHotpGenerator } from "./infrastructure/security/hotp-generator.js";
import { createTimeWindow } from "./infrastructure/security/time-window.js";
import { createTotpGenerator } from "./infrastructure/security/totp-generator.js";

export interface OtpStack {
  readonly config: OtpConfig;
  readonly logger: Logger;
  readonly hotp: HotpGenerator;
  readonly timeWindow: TimeWindow;
  readonly totp: TotpGenerator;
}

/**
 * Bootstrap — compose logger and generators from environment variables.
 * Misconfiguration surfaces as an INVALID_CONFIG error before anything is built.
 */
export const bootstrap = (
  env: Readonly<Record<string, string | undefined>> = process.env,
): Result<OtpStack, OtpError> => {
  // 1. Config (validated)
  const config = loadConfig(env);
  if (!config.ok) return config;
  const { otp, window, log } = config.value;

  // 2. Logging
  const logger = createLogger(log.level, { service: "otp" }, log.format);

  // 3. Generators
  const hotp = createHotpGenerator({ ...otp, logger });
  if (!hotp.ok) return hotp;
  const timeWindow = createTimeWindow({ ...window, logger });
  if (!timeWindow.ok) return timeWindow;
  const totp = createTotpGenerator({ ...otp, ...window, logger });
  if (!totp.ok) return totp;

  logger.info("OTP stack ready", {
    digits: otp.digits,
    algorithm: otp.algorithm,
    timeStep: window.timeStep,
  });

  return ok({
    config: config.value,
    logger,
    hotp: hotp.value,
    timeWindow: timeWindow.value,
    totp: totp.value,
  });
};
