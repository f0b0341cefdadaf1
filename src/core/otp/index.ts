export { MAX_COUNTER, toCounter, counterToBytes } from "./counter.js";
export { MIN_DIGEST_BYTES, truncate } from "./truncate.js";
export { formatCode } from "./code.js";
export { toUnixSeconds } from "./time.js";
