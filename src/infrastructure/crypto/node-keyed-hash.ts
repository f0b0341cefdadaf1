import { createHmac } from "node:crypto";
import type { HashAlgorithm, KeyedHash } from "../../core/ports/keyed-hash.js";

/**
 * HMAC via node:crypto. SHA-1 yields 20-byte digests, SHA-256 32, SHA-512 64.
 */
export const createNodeKeyedHash = (algorithm: HashAlgorithm): KeyedHash => ({
  algorithm,
  digest(key: Uint8Array, message: Uint8Array): Uint8Array {
    return createHmac(algorithm, key).update(message).digest();
  },
});
