import { AssertionFailedError } from "../errors.js";
import type { Severity, TestHandle } from "../types/handle.js";

export interface RecordedFailure {
  severity: Severity;
  message: string;
}

/**
 * In-memory handle that keeps every failure it receives. Fatal failures
 * still throw, like any other handle.
 */
export interface RecordingHandle extends TestHandle {
  readonly failures: readonly RecordedFailure[];
  readonly helperCalls: number;
  messages(): string[];
  reset(): void;
}

export function createRecordingHandle(): RecordingHandle {
  const failures: RecordedFailure[] = [];
  let helperCalls = 0;

  return {
    failures,
    get helperCalls() {
      return helperCalls;
    },

    fatal(message: string): never {
      failures.push({ severity: "fatal", message });
      throw new AssertionFailedError(message);
    },

    error(message: string): void {
      failures.push({ severity: "error", message });
    },

    helper(): void {
      helperCalls++;
    },

    messages(): string[] {
      return failures.map((f) => f.message);
    },

    reset(): void {
      failures.length = 0;
      helperCalls = 0;
    },
  };
}
