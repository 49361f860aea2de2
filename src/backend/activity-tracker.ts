import type { ActivityInterval, Sample } from '@shared/types';
import { PersistenceError } from '@shared/errors';
import { logger } from '@shared/logger';
import type { LogStore } from './logStore';
import type { WindowProbe } from './windowProbe';
import { SessionBuilder } from './sessionBuilder';
import { Sampler, type SamplerClock, type SamplerSleep } from './sampler';
import { defaultInactivityThresholdSeconds } from './defaults';

export type ActivityTrackerOptions = {
  inactivityThresholdMs: number;
};

/**
 * Write path: samples in, closed intervals appended to the log. A failed append
 * poisons the tracker; every later call rethrows rather than losing rows quietly.
 */
export class ActivityTracker {
  private readonly builder: SessionBuilder;
  private written = 0;
  private failure: PersistenceError | null = null;

  constructor(private readonly store: LogStore, options: ActivityTrackerOptions) {
    this.builder = new SessionBuilder(options.inactivityThresholdMs);
  }

  recordSample(sample: Sample) {
    this.assertHealthy();
    for (const interval of this.builder.push(sample)) {
      this.write(interval);
    }
  }

  /** Flushes the open interval, if any. */
  stop() {
    this.assertHealthy();
    const interval = this.builder.flush();
    if (interval) this.write(interval);
  }

  get intervalsWritten() {
    return this.written;
  }

  private assertHealthy() {
    if (this.failure) {
      throw new PersistenceError('Tracker is stopped after a failed write', { cause: this.failure });
    }
  }

  private write(interval: ActivityInterval) {
    try {
      this.store.append(interval);
    } catch (error) {
      this.failure = error instanceof PersistenceError
        ? error
        : new PersistenceError('Failed to append interval', { cause: error });
      logger.error('Could not write activity interval', this.failure.message);
      throw this.failure;
    }
    this.written += 1;
    const seconds = Math.round((interval.end.getTime() - interval.start.getTime()) / 1000);
    logger.info('Logged activity', `${interval.app} - ${interval.title}`, `${seconds}s`);
  }
}

export type TrackingOptions = {
  probe: WindowProbe;
  store: LogStore;
  intervalSeconds: number;
  /** Defaults to 1.5 × `intervalSeconds`. */
  inactivityThresholdSeconds?: number;
  awayThresholdSeconds?: number;
  signal?: AbortSignal;
  shouldStop?: () => boolean;
  now?: SamplerClock;
  sleep?: SamplerSleep;
};

/** Samples until stopped, then flushes. Rejects on the first durability failure. */
export async function runTracking(options: TrackingOptions) {
  const thresholdSeconds =
    options.inactivityThresholdSeconds ?? defaultInactivityThresholdSeconds(options.intervalSeconds);
  const tracker = new ActivityTracker(options.store, { inactivityThresholdMs: thresholdSeconds * 1000 });
  const sampler = new Sampler(options.probe, {
    awayThresholdSeconds: options.awayThresholdSeconds,
    now: options.now,
    sleep: options.sleep
  });

  logger.info(`Tracking every ${options.intervalSeconds}s (gap threshold ${thresholdSeconds}s)`);
  await sampler.run({
    intervalMs: options.intervalSeconds * 1000,
    onSample: (sample) => tracker.recordSample(sample),
    shouldStop: options.shouldStop ?? (() => false),
    signal: options.signal,
    onStop: () => tracker.stop()
  });
  logger.info(`Tracking stopped, ${tracker.intervalsWritten} interval(s) written`);

  return { intervalsWritten: tracker.intervalsWritten };
}
