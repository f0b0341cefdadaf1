import { readFileSync } from "node:fs";
import { describe, expect, it } from "vitest";
import { z } from "zod";
import { counterToBytes, toCounter } from "../../src/core/otp/counter.js";
import { truncate } from "../../src/core/otp/truncate.js";
import { createNodeKeyedHash } from "../../src/infrastructure/crypto/node-keyed-hash.js";
import { createHotpGenerator } from "../../src/infrastructure/security/hotp-generator.js";
import { createTimeWindow } from "../../src/infrastructure/security/time-window.js";
import { createTotpGenerator } from "../../src/infrastructure/security/totp-generator.js";

const algorithm = z.enum(["sha1", "sha256", "sha512"]);

const vectorFileSchema = z.object({
  hotp: z.object({
    secret: z.string(),
    digits: z.number(),
    vectors: z.array(z.object({ counter: z.number(), truncated: z.number(), code: z.string() })),
  }),
  totp: z.object({
    digits: z.number(),
    timeStep: z.number(),
    secrets: z.record(algorithm, z.string()),
    vectors: z.array(
      z.object({ time: z.number(), counter: z.number(), algorithm, code: z.string() }),
    ),
  }),
});

const fixtures = vectorFileSchema.parse(
  JSON.parse(readFileSync(new URL("../fixtures/rfc-vectors.json", import.meta.url), "utf8")),
);

describe("RFC 4226 Appendix D", () => {
  const { secret, digits, vectors } = fixtures.hotp;
  const key = Buffer.from(secret);
  const hash = createNodeKeyedHash("sha1");
  const generator = createHotpGenerator({ digits });

  it.each(vectors)("counter $counter truncates to $truncated", ({ counter, truncated }) => {
    const c = toCounter(counter);
    expect(c.ok).toBe(true);
    if (!c.ok) return;
    const digest = hash.digest(key, counterToBytes(c.value));
    expect(truncate(digest)).toEqual({ ok: true, value: truncated });
  });

  it.each(vectors)("counter $counter → $code", ({ counter, code }) => {
    expect(generator.ok).toBe(true);
    if (!generator.ok) return;
    expect(generator.value.generate(key, counter)).toEqual({ ok: true, value: code });
    expect(generator.value.validate(key, code, counter)).toEqual({ ok: true, value: true });
  });
});

describe("RFC 6238 Appendix B", () => {
  const { digits, timeStep, secrets, vectors } = fixtures.totp;
  const window = createTimeWindow({ timeStep });

  it.each(vectors)("$algorithm at $time → $code", ({ time, counter, algorithm, code }) => {
    const key = Buffer.from(secrets[algorithm] ?? "");
    const hotp = createHotpGenerator({ digits, algorithm });
    const totp = createTotpGenerator({ digits, algorithm, timeStep });
    expect(window.ok && hotp.ok && totp.ok).toBe(true);
    if (!window.ok || !hotp.ok || !totp.ok) return;

    const derived = window.value.at(time);
    expect(derived).toEqual({ ok: true, value: BigInt(counter) });
    if (!derived.ok) return;

    expect(hotp.value.generate(key, derived.value)).toEqual({ ok: true, value: code });
    expect(totp.value.generate(key, time)).toEqual({ ok: true, value: code });
    expect(totp.value.validate(key, code, new Date(time * 1000))).toEqual({
      ok: true,
      value: true,
    });
  });
});
