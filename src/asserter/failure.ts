import { formatMessage } from "../format/template.js";
import type { FailureEvent } from "../types/handle.js";
import { composeFailure, type AssertionContext } from "./context.js";

/**
 * Strategy deciding how a failed check surfaces. Asserters take one through
 * their options; the library's own tests swap in a recording one.
 */
export interface FailureReporter {
  report(context: AssertionContext, event: FailureEvent): void;
}

/**
 * Final text of a failure, bound message included
 */
export function renderFailure(context: AssertionContext, event: FailureEvent): string {
  const { format, args } = composeFailure(context, event.format, event.args);
  return formatMessage(format, args);
}

/**
 * Hands the rendered message to the test handle: fatal failures abort the
 * test, the others are recorded and execution continues.
 */
export const handleReporter: FailureReporter = {
  report(context, event) {
    const { handle } = context;
    handle.helper?.();
    const message = renderFailure(context, event);
    if (event.severity === "fatal") {
      handle.fatal(message);
    } else {
      handle.error(message);
    }
  },
};
