export { Asserter, createAsserter, type AsserterOptions, type TypeRef } from "./asserter.js";
export {
  createContext,
  composeFailure,
  separatorOf,
  type AssertionContext,
  type ScopeRecorder,
} from "./context.js";
export { handleReporter, renderFailure, type FailureReporter } from "./failure.js";
