export * from "./asserter/index.js";
export * from "./classify/index.js";
export * from "./compare/index.js";
export * from "./config/index.js";
export * from "./diff/index.js";
export * from "./format/index.js";
export * from "./handles/index.js";
export * from "./types/index.js";
export { AssertionFailedError, MissingHandleError } from "./errors.js";
