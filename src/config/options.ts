import { AffirmConfigSchema, type AffirmConfig } from '../types/config.js';
import { formatIssues } from './issues.js';

/**
 * The part of the configuration an asserter reads
 */
export type AsserterSettings = Pick<AffirmConfig, 'messageSeparator' | 'pollIntervalMs' | 'diffContext'>;

/**
 * Fill in defaults and validate. Accepts a full config, as returned by
 * loadConfig, as well as a partial one.
 */
export function resolveSettings(options: Partial<AsserterSettings> = {}): AsserterSettings {
  const result = AffirmConfigSchema.safeParse({
    messageSeparator: options.messageSeparator,
    pollIntervalMs: options.pollIntervalMs,
    diffContext: options.diffContext,
  });
  if (!result.success) {
    throw new Error(`Invalid asserter options:\n${formatIssues(result.error)}`);
  }

  const { messageSeparator, pollIntervalMs, diffContext } = result.data;
  return { messageSeparator, pollIntervalMs, diffContext };
}
