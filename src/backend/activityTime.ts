import { getNextLocalDayStartMs } from '@shared/time';

export const HOUR_MS = 60 * 60 * 1000;

export function floorToHourMs(valueMs: number) {
  const date = new Date(valueMs);
  date.setMinutes(0, 0, 0);
  return date.getTime();
}

export type TimeSlice = {
  startMs: number;
  endMs: number;
};

/** Cuts `[startMs, endMs)` at every local hour boundary. */
export function sliceByHour(startMs: number, endMs: number): TimeSlice[] {
  const slices: TimeSlice[] = [];
  let cursor = startMs;
  while (cursor < endMs) {
    const boundary = floorToHourMs(cursor) + HOUR_MS;
    const next = Math.min(endMs, boundary > cursor ? boundary : cursor + HOUR_MS);
    slices.push({ startMs: cursor, endMs: next });
    cursor = next;
  }
  return slices;
}

/** Cuts `[startMs, endMs)` at every local midnight. */
export function sliceByDay(startMs: number, endMs: number): TimeSlice[] {
  const slices: TimeSlice[] = [];
  let cursor = startMs;
  while (cursor < endMs) {
    const next = Math.min(endMs, getNextLocalDayStartMs(cursor));
    slices.push({ startMs: cursor, endMs: next });
    cursor = next;
  }
  return slices;
}
