export type { TestHandle, Severity, FailureEvent } from "./handle.js";
export type { EqualityHook, LegacyEqualityHook } from "./hook.js";
export { isEqualityHook, isLegacyEqualityHook } from "./hook.js";
export {
  AffirmConfigSchema,
  DEFAULT_MESSAGE_SEPARATOR,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_DIFF_CONTEXT,
  type AffirmConfig,
  type AffirmConfigInput,
  type ColorMode,
} from "./config.js";
