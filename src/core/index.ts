/**
 * Core barrel — the innermost ring. Zero external dependencies.
 */
export * from "./types/index.js";
export * from "./errors/index.js";
export * from "./ports/index.js";
export * from "./otp/index.js";
