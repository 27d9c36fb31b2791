export { type Result, ok, err } from "./result.js";
export {
  type Either,
  left,
  right,
  isLeft,
  isRight,
  fold,
} from "./either.js";
export { type Option, some, none, isSome, isNone } from "./option.js";
