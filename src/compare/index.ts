export { isEqual, indexOfEqual } from "./equal.js";
export { deepEqual } from "./deep-equal.js";
export { convertTo, type Conversion } from "./convert.js";
