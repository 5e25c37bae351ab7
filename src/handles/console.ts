import pc from "picocolors";
import { AssertionFailedError } from "../errors.js";
import type { ColorMode } from "../types/config.js";
import type { TestHandle } from "../types/handle.js";

export interface ConsoleHandleOptions {
  color?: ColorMode;
  /** where non-fatal failures are written; defaults to console.error */
  write?: (line: string) => void;
}

/**
 * Handle for runners that only understand thrown errors (Vitest, Jest,
 * Mocha, node:test). Fatal failures throw; non-fatal ones are logged and
 * kept until `assertNoErrors` is called, typically from an after-each hook.
 */
export interface ConsoleHandle extends TestHandle {
  readonly errors: readonly string[];
  assertNoErrors(): void;
}

function colorsFor(mode: ColorMode): ReturnType<typeof pc.createColors> {
  if (mode === "always") return pc.createColors(true);
  if (mode === "never") return pc.createColors(false);
  return pc;
}

export function createConsoleHandle(options: ConsoleHandleOptions = {}): ConsoleHandle {
  const colors = colorsFor(options.color ?? "auto");
  const write = options.write ?? ((line: string) => console.error(line));
  const errors: string[] = [];

  return {
    errors,

    fatal(message: string): never {
      throw new AssertionFailedError(message);
    },

    error(message: string): void {
      errors.push(message);
      write(`${colors.red("✗")} ${message}`);
    },

    assertNoErrors(): void {
      if (errors.length === 0) {
        return;
      }
      const failures = errors.splice(0, errors.length);
      const summary = failures.map((f) => `  - ${f}`).join("\n");
      write(colors.dim(`${failures.length} non-fatal assertion failure(s)`));
      throw new AssertionFailedError(
        `${failures.length} assertion(s) failed:\n${summary}`,
        failures
      );
    },
  };
}
