import type { ZodError } from "zod";

/**
 * One "  - path: message" line per issue
 */
export function formatIssues(error: ZodError): string {
  return error.errors
    .map((e) => `  - ${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`)
    .join('\n');
}
