/**
 * Thrown by a handle to abort the current test after a fatal failure
 */
export class AssertionFailedError extends Error {
  readonly failures: readonly string[];

  constructor(message: string, failures: readonly string[] = [message]) {
    super(message);
    this.name = "AssertionFailedError";
    this.failures = failures;
  }
}

/**
 * Thrown when an asserter is created without a test handle
 */
export class MissingHandleError extends Error {
  constructor() {
    super("You must provide a test handle.");
    this.name = "MissingHandleError";
  }
}
