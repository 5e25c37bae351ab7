import { z } from "zod";

export const DEFAULT_MESSAGE_SEPARATOR = " - ";
export const DEFAULT_POLL_INTERVAL_MS = 100;
export const DEFAULT_DIFF_CONTEXT = 3;

// auto leaves the decision to picocolors' terminal detection
const ColorModeSchema = z.enum(["auto", "always", "never"]);

export const AffirmConfigSchema = z.object({
  messageSeparator: z.string().min(1).default(DEFAULT_MESSAGE_SEPARATOR),
  pollIntervalMs: z.number().int().positive().default(DEFAULT_POLL_INTERVAL_MS),
  diffContext: z.number().int().nonnegative().default(DEFAULT_DIFF_CONTEXT),
  color: ColorModeSchema.default("auto"),
});

export type ColorMode = z.infer<typeof ColorModeSchema>;
export type AffirmConfig = z.infer<typeof AffirmConfigSchema>;
export type AffirmConfigInput = z.input<typeof AffirmConfigSchema>;
