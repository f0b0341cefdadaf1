import { describe, expect, it } from "vitest";
import { loadConfig } from "../../src/infrastructure/config/config.js";
import {
  parseHotpOptions,
  parseTimeWindowOptions,
} from "../../src/infrastructure/config/options.js";

describe("loadConfig", () => {
  it("falls back to defaults when nothing is set", () => {
    expect(loadConfig({})).toEqual({
      ok: true,
      value: {
        otp: { digits: 6, algorithm: "sha1" },
        window: { epoch: 0, timeStep: 30 },
        log: { level: "info", format: "pretty" },
      },
    });
  });

  it("coerces environment strings", () => {
    const r = loadConfig({
      OTP_DIGITS: "8",
      OTP_ALGORITHM: "sha256",
      OTP_EPOCH: "100",
      OTP_TIME_STEP: "60",
      LOG_LEVEL: "debug",
      LOG_FORMAT: "json",
    });
    expect(r).toEqual({
      ok: true,
      value: {
        otp: { digits: 8, algorithm: "sha256" },
        window: { epoch: 100, timeStep: 60 },
        log: { level: "debug", format: "json" },
      },
    });
  });

  it.each([
    ["OTP_DIGITS", "0", "otp.digits"],
    ["OTP_DIGITS", "eleven", "otp.digits"],
    ["OTP_ALGORITHM", "md5", "otp.algorithm"],
    ["OTP_EPOCH", "1.5", "window.epoch"],
    ["OTP_TIME_STEP", "0", "window.timeStep"],
    ["LOG_LEVEL", "verbose", "log.level"],
    ["LOG_FORMAT", "xml", "log.format"],
  ])("rejects %s=%s", (name, value, path) => {
    const r = loadConfig({ [name]: value });
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.error.code).toBe("INVALID_CONFIG");
      expect(Object.keys(r.error.details ?? {})).toEqual([path]);
    }
  });

  it("reports every invalid variable", () => {
    const r = loadConfig({ OTP_DIGITS: "0", OTP_TIME_STEP: "-1" });
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(Object.keys(r.error.details ?? {}).sort()).toEqual(["otp.digits", "window.timeStep"]);
    }
  });
});

describe("option parsing", () => {
  it("fills generator defaults", () => {
    expect(parseHotpOptions({})).toEqual({ ok: true, value: { digits: 6, algorithm: "sha1" } });
  });

  it("fills time-window defaults", () => {
    expect(parseTimeWindowOptions({})).toEqual({ ok: true, value: { epoch: 0, timeStep: 30 } });
  });

  it("keeps explicit values", () => {
    expect(parseHotpOptions({ digits: 8, algorithm: "sha512" })).toEqual({
      ok: true,
      value: { digits: 8, algorithm: "sha512" },
    });
  });
});
