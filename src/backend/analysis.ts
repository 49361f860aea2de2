import { ZodError } from 'zod';
import type { ActivityInterval, AggregationResult, DateRange } from '@shared/types';
import { DateRangeError } from '@shared/errors';
import { describeRange, parseDateExpression } from '@shared/time';
import { logger } from '@shared/logger';
import { summarize } from './aggregator';
import type { ActivityKeyFn } from './activityKey';
import { CategoryResolver, type UnknownAppHandler } from './categoryResolver';
import { JsonCategoryStore, type CategoryStore } from './categoryStore';
import { boundsOf, overlapsRange } from './logStore';
import { readLog } from './openLogStore';

export type CategoryEdit = {
  app: string;
  category: string;
};

export type AnalysisOptions = {
  logFile: string;
  /** Path of the JSON category document, or a ready store. */
  categories: string | CategoryStore;
  /**
   * A range, or a date expression (`today`, `2024-01-15..2024-01-17`). An
   * expression is parsed after the log is read so a bad one can be reported
   * against the days the log covers.
   */
  range: DateRange | string;
  now?: Date;
  onUnknown: UnknownAppHandler;
  edits?: CategoryEdit[];
  minDurationSeconds?: number;
  topN?: number;
  requireDurable?: boolean;
  activityKey?: ActivityKeyFn;
};

export type AnalysisOutcome = {
  result: AggregationResult;
  /** Malformed records the log reader left out. */
  skipped: number;
  nonDurable: string[];
};

function resolveRange(range: DateRange | string, now: Date | undefined, intervals: ActivityInterval[]) {
  if (typeof range !== 'string') return range;
  try {
    return parseDateExpression(range, now);
  } catch (error) {
    if (!(error instanceof ZodError)) throw error;
    const reason = error.issues[0]?.message ?? 'not a date expression';
    throw new DateRangeError(`Invalid date range "${range}": ${reason}`, boundsOf(intervals), { cause: error });
  }
}

/**
 * Read path: load the log, load the category map fresh, apply explicit edits,
 * then aggregate. Nothing is rendered here, so a failure leaves no partial output.
 */
export async function runAnalysis(options: AnalysisOptions): Promise<AnalysisOutcome> {
  const read = readLog(options.logFile);
  const range = resolveRange(options.range, options.now, read.intervals);

  const categoryStore = typeof options.categories === 'string'
    ? new JsonCategoryStore(options.categories)
    : options.categories;
  const resolver = CategoryResolver.load(categoryStore, {
    onUnknown: options.onUnknown,
    requireDurable: options.requireDurable
  });
  for (const edit of options.edits ?? []) {
    resolver.editMapping(edit.app, edit.category);
    logger.info(`Category for "${edit.app}" set to "${edit.category}"`);
  }

  const inRange = read.intervals.filter((interval) => overlapsRange(interval, range));
  if (inRange.length === 0) {
    throw new DateRangeError(`No activity recorded for ${describeRange(range)}`, boundsOf(read.intervals));
  }

  const result = await summarize(inRange, resolver, range, {
    minDurationSeconds: options.minDurationSeconds,
    topN: options.topN,
    activityKey: options.activityKey
  });
  if (result.intervalCount === 0) {
    throw new DateRangeError(
      `No activity of at least ${options.minDurationSeconds ?? 0}s recorded for ${describeRange(range)}`,
      boundsOf(read.intervals)
    );
  }

  return {
    result,
    skipped: read.skipped,
    nonDurable: [...resolver.nonDurable]
  };
}
