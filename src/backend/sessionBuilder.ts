import type { ActivityInterval, Sample } from '@shared/types';
import { isIdleSample } from '@shared/types';
import { logger } from '@shared/logger';

type OpenInterval = {
  startMs: number;
  endMs: number;
  app: string;
  title: string;
};

/**
 * Folds a stream of samples into closed intervals of continuous focus on one
 * (app, title) pair.
 *
 * An interval closes at the last sample that still belonged to it, never at the
 * sample that ended it, so a gap or a switch is not credited to the old window.
 * Samples further apart than the inactivity threshold break continuity even when
 * the window did not change.
 */
export class SessionBuilder {
  private current: OpenInterval | null = null;
  private lastSampleMs: number | null = null;

  constructor(private readonly inactivityThresholdMs: number) {
    if (!Number.isFinite(inactivityThresholdMs) || inactivityThresholdMs <= 0) {
      throw new Error(`Inactivity threshold must be positive, got ${inactivityThresholdMs}`);
    }
  }

  /** Returns the intervals this sample closed (at most one). */
  push(sample: Sample): ActivityInterval[] {
    const ts = sample.timestamp.getTime();
    if (!Number.isFinite(ts)) {
      logger.debug('Dropping sample with invalid timestamp', sample.app);
      return [];
    }
    if (this.lastSampleMs !== null && ts <= this.lastSampleMs) {
      logger.debug('Dropping out-of-order sample', sample.app, new Date(ts).toISOString());
      return [];
    }

    const idle = isIdleSample(sample);
    const gapExceeded = this.lastSampleMs !== null && ts - this.lastSampleMs > this.inactivityThresholdMs;
    const closed: ActivityInterval[] = [];

    if (this.current) {
      const sameWindow = !idle && this.current.app === sample.app && this.current.title === sample.title;
      if (sameWindow && !gapExceeded) {
        this.current.endMs = ts;
      } else {
        const interval = this.close();
        if (interval) closed.push(interval);
      }
    }

    if (!this.current && !idle) {
      this.current = { startMs: ts, endMs: ts, app: sample.app, title: sample.title };
    }

    this.lastSampleMs = ts;
    return closed;
  }

  /** Closes whatever is open at the last accepted sample time. */
  flush(): ActivityInterval | null {
    const interval = this.close();
    this.lastSampleMs = null;
    return interval;
  }

  get openInterval(): Readonly<ActivityInterval> | null {
    if (!this.current) return null;
    return {
      start: new Date(this.current.startMs),
      end: new Date(this.current.endMs),
      app: this.current.app,
      title: this.current.title
    };
  }

  private close(): ActivityInterval | null {
    const open = this.current;
    this.current = null;
    if (!open) return null;
    if (open.endMs <= open.startMs) {
      logger.debug('Discarding single-sample interval', open.app, open.title);
      return null;
    }
    return {
      start: new Date(open.startMs),
      end: new Date(open.endMs),
      app: open.app,
      title: open.title
    };
  }
}
