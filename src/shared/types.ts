/** App name carried by a sample taken while nothing is focused. */
export const IDLE_SAMPLE_APP = '';

export type Sample = {
  timestamp: Date;
  app: string;
  title: string;
};

export type ActivityInterval = {
  start: Date;
  end: Date;
  app: string;
  title: string;
};

export type CategoryMap = Record<string, string>;

/** Half-open `[start, end)` window in local time. */
export type DateRange = {
  start: Date;
  end: Date;
};

export type LogReadResult = {
  intervals: ActivityInterval[];
  /** Records that could not be parsed and were left out. */
  skipped: number;
};

export type AppTotal = {
  app: string;
  seconds: number;
};

export type CategorySummary = {
  category: string;
  seconds: number;
  /** Number of intervals that contributed. */
  count: number;
  percentage: number;
};

export type HourTotal = {
  hour: number;
  seconds: number;
};

export type AggregationResult = {
  range: DateRange;
  totalSeconds: number;
  intervalCount: number;
  totalsByCategory: Record<string, number>;
  totalsByApp: Record<string, number>;
  /** Index is the local wall-clock hour, 0-23. */
  hourlyDistribution: number[];
  /** Keyed by local `YYYY-MM-DD`. */
  dailyTotals: Record<string, number>;
  topApps: AppTotal[];
  categorySummaries: CategorySummary[];
  peakHours: HourTotal[];
};

export type ReportOutput = 'bar' | 'pie' | 'both';

export function isIdleSample(sample: Sample) {
  return sample.app.trim() === IDLE_SAMPLE_APP;
}
