import { setTimeout as delay } from 'node:timers/promises';
import type { Sample } from '@shared/types';
import { IDLE_SAMPLE_APP } from '@shared/types';
import { logger } from '@shared/logger';
import type { WindowProbe } from './windowProbe';

export type SamplerClock = () => Date;
export type SamplerSleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type SamplerOptions = {
  /** Samples whose probe reports at least this much input idle time count as idle. */
  awayThresholdSeconds?: number;
  now?: SamplerClock;
  sleep?: SamplerSleep;
};

export type SamplerRunOptions = {
  intervalMs: number;
  onSample: (sample: Sample) => void | Promise<void>;
  shouldStop: () => boolean;
  signal?: AbortSignal;
  /** Runs once after the last sample of a graceful stop. */
  onStop?: () => void | Promise<void>;
};

async function abortableSleep(ms: number, signal?: AbortSignal) {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) return;
    throw error;
  }
}

export class Sampler {
  private readonly now: SamplerClock;
  private readonly sleep: SamplerSleep;
  private failureStreak = 0;

  constructor(
    private readonly probe: WindowProbe,
    private readonly options: SamplerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? abortableSleep;
  }

  async run({ intervalMs, onSample, shouldStop, signal, onStop }: SamplerRunOptions): Promise<void> {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new Error(`Sampling interval must be positive, got ${intervalMs}`);
    }
    const stopped = () => shouldStop() || signal?.aborted === true;

    while (!stopped()) {
      const tickAt = this.now();
      await onSample(await this.sample(tickAt));
      if (stopped()) break;
      const elapsedMs = this.now().getTime() - tickAt.getTime();
      await this.sleep(Math.max(0, intervalMs - elapsedMs), signal);
    }

    await onStop?.();
  }

  /** Probes once. Never rejects: an unreachable window system reads as idle. */
  async sample(timestamp: Date): Promise<Sample> {
    try {
      const win = await this.probe();
      if (this.failureStreak > 0) {
        logger.info(`Window probe recovered after ${this.failureStreak} failed tick(s)`);
        this.failureStreak = 0;
      }
      if (!win || this.isAway(win.idleSeconds)) {
        return { timestamp, app: IDLE_SAMPLE_APP, title: '' };
      }
      return { timestamp, app: win.app, title: win.title };
    } catch (error) {
      this.failureStreak += 1;
      if (this.failureStreak === 1) {
        logger.warn('Window probe failed, recording idle until it recovers', error);
      } else {
        logger.debug('Window probe still failing', error);
      }
      return { timestamp, app: IDLE_SAMPLE_APP, title: '' };
    }
  }

  private isAway(idleSeconds: number | undefined) {
    const threshold = this.options.awayThresholdSeconds;
    if (threshold === undefined || threshold <= 0 || idleSeconds === undefined) return false;
    return idleSeconds >= threshold;
  }
}
