export { Try, type Success, type Failure } from "./try.js";
export { capture } from "./capture.js";
export { interrupt, isInterrupted, interrupted } from "./interrupt.js";
