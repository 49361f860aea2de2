import { z } from 'zod';
import {
  DEFAULT_AWAY_THRESHOLD_SECONDS,
  DEFAULT_CATEGORY_FILE,
  DEFAULT_LOG_FILE,
  DEFAULT_MIN_DURATION_SECONDS,
  DEFAULT_POLL_INTERVAL_SECONDS,
  DEFAULT_TOP_APPS,
  defaultInactivityThresholdSeconds
} from '@backend/defaults';

const positiveSeconds = z.coerce.number().finite().positive();
const filePath = z.string().trim().min(1);

export const categoryEditSchema = z
  .string()
  .transform((value, ctx) => {
    // Split on the last '=' so app names may contain one.
    const at = value.lastIndexOf('=');
    const app = at === -1 ? '' : value.slice(0, at).trim();
    const category = at === -1 ? '' : value.slice(at + 1).trim();
    if (!app || !category) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected app=category, got "${value}"` });
      return z.NEVER;
    }
    return { app, category };
  });

export const trackOptionsSchema = z
  .object({
    interval: positiveSeconds.default(DEFAULT_POLL_INTERVAL_SECONDS),
    logFile: filePath.default(DEFAULT_LOG_FILE),
    idleThreshold: positiveSeconds.optional(),
    awayThreshold: z.coerce.number().finite().nonnegative().default(DEFAULT_AWAY_THRESHOLD_SECONDS),
    verbose: z.boolean().default(false)
  })
  .transform((options) => ({
    ...options,
    idleThreshold: options.idleThreshold ?? defaultInactivityThresholdSeconds(options.interval)
  }));

export type TrackOptions = z.infer<typeof trackOptionsSchema>;

export const analyzeOptionsSchema = z.object({
  date: z.string().trim().default('today'),
  output: z.enum(['bar', 'pie', 'both']).default('both'),
  logFile: filePath.default(DEFAULT_LOG_FILE),
  categoryFile: filePath.default(DEFAULT_CATEGORY_FILE),
  set: z.array(categoryEditSchema).default([]),
  minDuration: z.coerce.number().finite().nonnegative().default(DEFAULT_MIN_DURATION_SECONDS),
  top: z.coerce.number().int().positive().default(DEFAULT_TOP_APPS),
  strict: z.boolean().default(false),
  byTitle: z.boolean().default(false),
  verbose: z.boolean().default(false)
});

export type AnalyzeOptions = z.infer<typeof analyzeOptionsSchema>;

export function collect(value: string, previous: string[] = []) {
  return [...previous, value];
}
