export { type Brand, type Counter, brand } from "./brand.js";
export {
  type Result,
  type Ok,
  type Err,
  ok,
  err,
  map,
  flatMap,
  unwrapOr,
  tryCatch,
} from "./result.js";
