export { createNodeKeyedHash } from "./node-keyed-hash.js";
