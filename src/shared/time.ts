import { z } from 'zod';
import type { DateRange } from './types';

export function getLocalDayStartMs(referenceMs: number) {
  const date = new Date(referenceMs);
  date.setHours(0, 0, 0, 0);
  return date.getTime();
}

export function getNextLocalDayStartMs(referenceMs: number) {
  const date = new Date(getLocalDayStartMs(referenceMs));
  date.setDate(date.getDate() + 1);
  return date.getTime();
}

function pad2(value: number) {
  return String(value).padStart(2, '0');
}

/** Local calendar day as `YYYY-MM-DD`. */
export function formatDayKey(valueMs: number) {
  const date = new Date(valueMs);
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

const dayKeySchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
  .transform((value, ctx) => {
    const [year, month, day] = value.split('-').map(Number);
    const date = new Date(year, month - 1, day);
    if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${value} is not a calendar date` });
      return z.NEVER;
    }
    return date;
  });

function dayRange(startDay: Date, endDayInclusive: Date): DateRange {
  return {
    start: new Date(getLocalDayStartMs(startDay.getTime())),
    end: new Date(getNextLocalDayStartMs(endDayInclusive.getTime()))
  };
}

/**
 * Accepts `today`, `yesterday`, `YYYY-MM-DD` or an inclusive `YYYY-MM-DD..YYYY-MM-DD`.
 * Throws a ZodError for anything else, including a range whose end precedes its start.
 */
export function parseDateExpression(expression: string, now: Date = new Date()): DateRange {
  const value = expression.trim().toLowerCase();
  if (value === '' || value === 'today') {
    return dayRange(now, now);
  }
  if (value === 'yesterday') {
    const yesterday = new Date(getLocalDayStartMs(now.getTime()));
    yesterday.setDate(yesterday.getDate() - 1);
    return dayRange(yesterday, yesterday);
  }

  const parts = value.split('..');
  if (parts.length === 1) {
    const day = dayKeySchema.parse(parts[0]);
    return dayRange(day, day);
  }

  const bounds = z
    .tuple([dayKeySchema, dayKeySchema])
    .refine(([from, to]) => from.getTime() <= to.getTime(), { message: 'range end is before its start' })
    .parse(parts);
  return dayRange(bounds[0], bounds[1]);
}

export function describeRange(range: DateRange) {
  const first = formatDayKey(range.start.getTime());
  const last = formatDayKey(range.end.getTime() - 1);
  return first === last ? first : `${first} to ${last}`;
}
