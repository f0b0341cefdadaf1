import { timingSafeEqual as bytesEqual } from "node:crypto";

const encoder = new TextEncoder();

/**
 * Constant-time string comparison for codes. Only the length check
 * short-circuits, and code length is public (it is the digit count).
 */
export const timingSafeEqual = (a: string, b: string): boolean => {
  const bufA = encoder.encode(a);
  const bufB = encoder.encode(b);
  if (bufA.byteLength !== bufB.byteLength) return false;
  return bytesEqual(bufA, bufB);
};
