import type {
  ActivityInterval,
  AggregationResult,
  AppTotal,
  CategorySummary,
  DateRange,
  HourTotal
} from '@shared/types';
import { DateRangeError } from '@shared/errors';
import { formatDayKey } from '@shared/time';
import { sliceByDay, sliceByHour } from './activityTime';
import { appNameKey, type ActivityKeyFn } from './activityKey';
import { DEFAULT_PEAK_HOURS } from './defaults';

export type SummaryOptions = {
  /** Intervals shorter than this (before clipping) are treated as noise. */
  minDurationSeconds?: number;
  /** Truncates `topApps`; all apps when omitted. */
  topN?: number;
  peakHours?: number;
  /** Key categories are looked up by; the app name when omitted. */
  activityKey?: ActivityKeyFn;
};

export interface AppCategorizer {
  resolve(key: string): Promise<string>;
}

function compareText(a: string, b: string) {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function clippedSpan(interval: ActivityInterval, range: DateRange, minDurationMs: number) {
  const startMs = interval.start.getTime();
  const endMs = interval.end.getTime();
  if (!(endMs > startMs) || endMs - startMs < minDurationMs) return null;
  const clipStartMs = Math.max(startMs, range.start.getTime());
  const clipEndMs = Math.min(endMs, range.end.getTime());
  if (clipEndMs <= clipStartMs) return null;
  return { startMs: clipStartMs, endMs: clipEndMs };
}

function assertRange(range: DateRange) {
  const startMs = range.start.getTime();
  const endMs = range.end.getTime();
  if (!Number.isFinite(startMs) || !Number.isFinite(endMs) || endMs <= startMs) {
    throw new DateRangeError('Date range is empty or invalid');
  }
}

function addTo(map: Map<string, number>, key: string, seconds: number) {
  map.set(key, (map.get(key) ?? 0) + seconds);
}

/**
 * Pure aggregation over already-categorised activity keys. Every interval is clipped to the
 * range; its clipped span counts once toward app/category totals and is cut at
 * local hour and day boundaries for the hourly and daily views.
 */
export function computeSummary(
  intervals: ActivityInterval[],
  categories: ReadonlyMap<string, string>,
  range: DateRange,
  options: SummaryOptions = {}
): AggregationResult {
  assertRange(range);
  const minDurationMs = Math.max(0, options.minDurationSeconds ?? 0) * 1000;
  const activityKey = options.activityKey ?? appNameKey;

  const byApp = new Map<string, number>();
  const byCategory = new Map<string, number>();
  const countByCategory = new Map<string, number>();
  const byDay = new Map<string, number>();
  const hourly: number[] = Array.from({ length: 24 }, () => 0);
  let totalSeconds = 0;
  let intervalCount = 0;

  for (const interval of intervals) {
    const span = clippedSpan(interval, range, minDurationMs);
    if (!span) continue;
    const key = activityKey(interval.app, interval.title);
    const category = categories.get(key);
    if (category === undefined) {
      throw new Error(`No category resolved for "${key}"`);
    }

    const seconds = (span.endMs - span.startMs) / 1000;
    totalSeconds += seconds;
    intervalCount += 1;
    addTo(byApp, interval.app, seconds);
    addTo(byCategory, category, seconds);
    addTo(countByCategory, category, 1);

    for (const slice of sliceByHour(span.startMs, span.endMs)) {
      hourly[new Date(slice.startMs).getHours()] += (slice.endMs - slice.startMs) / 1000;
    }
    for (const slice of sliceByDay(span.startMs, span.endMs)) {
      addTo(byDay, formatDayKey(slice.startMs), (slice.endMs - slice.startMs) / 1000);
    }
  }

  const rankedApps: AppTotal[] = [...byApp.entries()]
    .map(([app, appSeconds]) => ({ app, seconds: appSeconds }))
    .sort((a, b) => b.seconds - a.seconds || compareText(a.app, b.app));

  const categorySummaries: CategorySummary[] = [...byCategory.entries()]
    .map(([category, categorySeconds]) => ({
      category,
      seconds: categorySeconds,
      count: countByCategory.get(category) ?? 0,
      percentage: totalSeconds > 0 ? (categorySeconds / totalSeconds) * 100 : 0
    }))
    .sort((a, b) => b.seconds - a.seconds || compareText(a.category, b.category));

  const peakHours: HourTotal[] = hourly
    .map((hourSeconds, hour) => ({ hour, seconds: hourSeconds }))
    .filter((slot) => slot.seconds > 0)
    .sort((a, b) => b.seconds - a.seconds || a.hour - b.hour)
    .slice(0, options.peakHours ?? DEFAULT_PEAK_HOURS);

  return {
    range,
    totalSeconds,
    intervalCount,
    totalsByCategory: Object.fromEntries(byCategory),
    totalsByApp: Object.fromEntries(byApp),
    hourlyDistribution: hourly,
    dailyTotals: Object.fromEntries(byDay),
    topApps: options.topN === undefined ? rankedApps : rankedApps.slice(0, Math.max(0, options.topN)),
    categorySummaries,
    peakHours
  };
}

/**
 * Resolves the category of every activity key that contributes to the range (one
 * at a time, in name order, since resolving may prompt) and then aggregates.
 */
export async function summarize(
  intervals: ActivityInterval[],
  categorizer: AppCategorizer,
  range: DateRange,
  options: SummaryOptions = {}
): Promise<AggregationResult> {
  assertRange(range);
  const minDurationMs = Math.max(0, options.minDurationSeconds ?? 0) * 1000;
  const activityKey = options.activityKey ?? appNameKey;
  const keys = new Set<string>();
  for (const interval of intervals) {
    if (clippedSpan(interval, range, minDurationMs)) keys.add(activityKey(interval.app, interval.title));
  }

  const categories = new Map<string, string>();
  for (const key of [...keys].sort(compareText)) {
    categories.set(key, await categorizer.resolve(key));
  }
  return computeSummary(intervals, categories, range, options);
}
