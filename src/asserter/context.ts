import type { AsserterSettings } from "../config/options.js";
import type { TestHandle } from "../types/handle.js";
import type { FailureReporter } from "./failure.js";

/**
 * Failure flag of a lax scope. Shared by every context derived inside the
 * scope, so a message added to the scoped asserter still counts.
 */
export interface ScopeRecorder {
  failed: boolean;
}

/**
 * Everything an asserter knows. Never mutated: each `with*` function
 * returns a fresh copy, so a derived asserter cannot affect its parent.
 */
export interface AssertionContext {
  readonly handle: TestHandle;
  readonly strict: boolean;
  readonly messageTemplate: string;
  readonly messageArgs: readonly unknown[];
  /** explicit separator; undefined falls back to the configured one */
  readonly messageSeparator: string | undefined;
  readonly scope: ScopeRecorder | undefined;
  readonly reporter: FailureReporter;
  readonly settings: AsserterSettings;
}

export function createContext(
  handle: TestHandle,
  settings: AsserterSettings,
  reporter: FailureReporter
): AssertionContext {
  return {
    handle,
    strict: true,
    messageTemplate: "",
    messageArgs: [],
    messageSeparator: undefined,
    scope: undefined,
    reporter,
    settings,
  };
}

export function separatorOf(context: AssertionContext): string {
  return context.messageSeparator ?? context.settings.messageSeparator;
}

export function hasMessage(context: AssertionContext): boolean {
  return context.messageTemplate.length > 0;
}

export function withMessage(
  context: AssertionContext,
  format: string,
  args: readonly unknown[]
): AssertionContext {
  return { ...context, messageTemplate: format, messageArgs: [...args] };
}

export function withAppendedMessage(
  context: AssertionContext,
  format: string,
  args: readonly unknown[]
): AssertionContext {
  if (!hasMessage(context)) {
    return withMessage(context, format, args);
  }
  return {
    ...context,
    messageTemplate: `${context.messageTemplate}${separatorOf(context)}${format}`,
    messageArgs: [...context.messageArgs, ...args],
  };
}

export function withPrependedMessage(
  context: AssertionContext,
  format: string,
  args: readonly unknown[]
): AssertionContext {
  if (!hasMessage(context)) {
    return withMessage(context, format, args);
  }
  return {
    ...context,
    messageTemplate: `${format}${separatorOf(context)}${context.messageTemplate}`,
    messageArgs: [...args, ...context.messageArgs],
  };
}

export function withSeparator(context: AssertionContext, separator: string): AssertionContext {
  return { ...context, messageSeparator: separator.length > 0 ? separator : undefined };
}

export function withStrictness(context: AssertionContext, strict: boolean): AssertionContext {
  return { ...context, strict };
}

export function withHandle(context: AssertionContext, handle: TestHandle): AssertionContext {
  return { ...context, handle };
}

export function withScope(context: AssertionContext, scope: ScopeRecorder): AssertionContext {
  return { ...context, scope };
}

/**
 * Join a failure's own format and arguments with the bound message, if any:
 * `format + separator + template`, arguments in the same order
 */
export function composeFailure(
  context: AssertionContext,
  format: string,
  args: readonly unknown[]
): { format: string; args: unknown[] } {
  if (!hasMessage(context)) {
    return { format, args: [...args] };
  }
  return {
    format: `${format}${separatorOf(context)}${context.messageTemplate}`,
    args: [...args, ...context.messageArgs],
  };
}
