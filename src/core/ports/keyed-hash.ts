/**
 * Port: Keyed hash (HMAC) primitive.
 * Combines a secret key and a message into a fixed-length digest.
 */

/** Hash functions named by RFC 4226 / RFC 6238 */
export type HashAlgorithm = "sha1" | "sha256" | "sha512";

export interface KeyedHash {
  /** Display name, e.g. "sha1" */
  readonly algorithm: string;
  digest(key: Uint8Array, message: Uint8Array): Uint8Array;
}
