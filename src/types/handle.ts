/**
 * Reporting capability of the host test runner.
 *
 * An asserter never decides on its own how a failure surfaces; it hands the
 * rendered message to the handle it was created with.
 */
export interface TestHandle {
  /**
   * Record the failure and abort the current test. Implementations must not
   * return normally, which in practice means throwing.
   */
  fatal(message: string): never;

  /**
   * Record the failure and let the test keep running
   */
  error(message: string): void;

  /**
   * Mark the calling function as a helper so the runner can attribute the
   * failure to the caller. Optional: most JavaScript runners have no use for it.
   */
  helper?(): void;
}

export type Severity = "fatal" | "error";

/**
 * A single failure on its way to the handle
 */
export interface FailureEvent {
  format: string;
  args: unknown[];
  severity: Severity;
}
