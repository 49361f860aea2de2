import path from 'node:path';
import type { ActivityInterval, DateRange, LogReadResult } from '@shared/types';
import { formatDayKey } from '@shared/time';
import type { LogBounds } from '@shared/errors';
import { SQLITE_LOG_EXTENSIONS } from './defaults';

/**
 * Append-only interval log. Each `append` is one atomic record; readers get
 * intervals ordered by start time and a count of records they had to skip.
 */
export interface LogStore {
  append(interval: ActivityInterval): void;
  readAll(range?: DateRange): LogReadResult;
  close(): void;
}

export type LogStoreKind = 'csv' | 'sqlite';

export function logStoreKindFor(filePath: string): LogStoreKind {
  const ext = path.extname(filePath).toLowerCase();
  return SQLITE_LOG_EXTENSIONS.includes(ext) ? 'sqlite' : 'csv';
}

export function overlapsRange(interval: ActivityInterval, range: DateRange) {
  return interval.start.getTime() < range.end.getTime() && interval.end.getTime() > range.start.getTime();
}

/** Stable: intervals sharing a start keep their log order. */
export function sortByStart(intervals: ActivityInterval[]) {
  return intervals
    .map((interval, index) => ({ interval, index }))
    .sort((a, b) => a.interval.start.getTime() - b.interval.start.getTime() || a.index - b.index)
    .map(({ interval }) => interval);
}

export function boundsOf(intervals: ActivityInterval[]): LogBounds | null {
  if (intervals.length === 0) return null;
  let firstMs = Infinity;
  let lastMs = -Infinity;
  for (const interval of intervals) {
    firstMs = Math.min(firstMs, interval.start.getTime());
    lastMs = Math.max(lastMs, interval.end.getTime());
  }
  return { firstDay: formatDayKey(firstMs), lastDay: formatDayKey(lastMs - 1) };
}
