import { afterEach, describe, expect, it, vi } from "vitest";
import { createTotpGenerator } from "../../src/infrastructure/security/totp-generator.js";

const KEY = Buffer.from("12345678901234567890");

const build = (...args: Parameters<typeof createTotpGenerator>) => {
  const r = createTotpGenerator(...args);
  if (!r.ok) throw new Error(r.error.message);
  return r.value;
};

describe("createTotpGenerator", () => {
  it("exposes the combined configuration", () => {
    const totp = build({ digits: 8, algorithm: "sha256", timeStep: 60, epoch: 5 });
    expect(totp.digits).toBe(8);
    expect(totp.algorithm).toBe("sha256");
    expect(totp.timeStep).toBe(60);
    expect(totp.epoch).toBe(5);
  });

  it("rejects invalid generator options", () => {
    const r = createTotpGenerator({ digits: 0 });
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error.code).toBe("INVALID_CONFIG");
  });

  it("rejects invalid window options", () => {
    const r = createTotpGenerator({ timeStep: 0 });
    expect(r.ok).toBe(false);
    if (!r.ok) expect(Object.keys(r.error.details ?? {})).toEqual(["timeStep"]);
  });
});

describe("TotpGenerator with an injected clock", () => {
  const totp = build({ digits: 8, clock: () => new Date(59_000) });

  it("generates for the clock's window", () => {
    expect(totp.generate(KEY)).toEqual({ ok: true, value: "94287082" });
    expect(totp.counterAt()).toEqual({ ok: true, value: 1n });
    expect(totp.remaining()).toEqual({ ok: true, value: 1 });
  });

  it("lets an explicit time override the clock", () => {
    expect(totp.generate(KEY, 1111111109)).toEqual({ ok: true, value: "07081804" });
    expect(totp.generate(KEY, 89)).toEqual({ ok: true, value: "37359152" });
  });

  it("validates within the current window only", () => {
    expect(totp.validate(KEY, "94287082")).toEqual({ ok: true, value: true });
    expect(totp.validate(KEY, "94287082", 30)).toEqual({ ok: true, value: true });
    expect(totp.validate(KEY, "94287082", 29)).toEqual({ ok: true, value: false });
    expect(totp.validate(KEY, "94287082", 60)).toEqual({ ok: true, value: false });
  });

  it("compares the padded code", () => {
    expect(totp.validate(KEY, "07081804", 1111111109)).toEqual({ ok: true, value: true });
    expect(totp.validate(KEY, "7081804", 1111111109)).toEqual({ ok: true, value: false });
  });

  it("propagates time errors", () => {
    const shifted = build({ epoch: 100, clock: () => new Date(0) });
    const r = shifted.generate(KEY);
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error.code).toBe("TIMESTAMP_BEFORE_EPOCH");
    const v = shifted.validate(KEY, "000000");
    expect(v.ok).toBe(false);
  });
});

describe("TotpGenerator with the system clock", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("reads the current time by default", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(1111111109_000));
    const totp = build({ digits: 8 });
    expect(totp.generate(KEY)).toEqual({ ok: true, value: "07081804" });
    expect(totp.counterAt()).toEqual({ ok: true, value: 37037036n });
  });
});
