export { createLogger, createNoopLogger, type LogFormat } from "./logger.js";
