import fs from 'node:fs';
import path from 'node:path';
import type { ActivityInterval, DateRange, LogReadResult } from '@shared/types';
import { PersistenceError } from '@shared/errors';
import { logger } from '@shared/logger';
import type { LogStore } from './logStore';
import { overlapsRange, sortByStart } from './logStore';

export const CSV_HEADER = ['start', 'end', 'app_name', 'window_title'] as const;

function hasErrorCode(error: unknown, code: string) {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

function isProcessAlive(pid: number) {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: alive, owned by someone else.
    return hasErrorCode(error, 'EPERM');
  }
}

export function encodeField(value: string) {
  const flat = value.replace(/[\r\n]+/g, ' ');
  return /[",]/.test(flat) ? `"${flat.replace(/"/g, '""')}"` : flat;
}

/** Splits one RFC 4180 line. Returns null on an unterminated or misplaced quote. */
export function parseCsvLine(line: string): string[] | null {
  const fields: string[] = [];
  let i = 0;
  for (;;) {
    if (line[i] === '"') {
      let value = '';
      i += 1;
      for (;;) {
        if (i >= line.length) return null;
        if (line[i] === '"') {
          if (line[i + 1] === '"') {
            value += '"';
            i += 2;
            continue;
          }
          i += 1;
          break;
        }
        value += line[i];
        i += 1;
      }
      fields.push(value);
      if (i === line.length) return fields;
      if (line[i] !== ',') return null;
      i += 1;
    } else {
      const next = line.indexOf(',', i);
      if (next === -1) {
        fields.push(line.slice(i));
        return fields;
      }
      fields.push(line.slice(i, next));
      i = next + 1;
    }
  }
}

/** ISO-8601, or epoch seconds as written by older trackers. */
export function parseTimestamp(raw: string): Date | null {
  const value = raw.trim();
  if (value === '') return null;
  const ms = /^\d+(\.\d+)?$/.test(value) ? Number(value) * 1000 : Date.parse(value);
  return Number.isFinite(ms) ? new Date(ms) : null;
}

function isHeader(fields: string[]) {
  return fields[0]?.trim().toLowerCase() === CSV_HEADER[0] && fields[1]?.trim().toLowerCase() === CSV_HEADER[1];
}

export function decodeRecord(fields: string[]): ActivityInterval | null {
  // Columns past the fourth belong to newer writers and are ignored.
  if (fields.length < CSV_HEADER.length) return null;
  const start = parseTimestamp(fields[0]);
  const end = parseTimestamp(fields[1]);
  if (!start || !end || end.getTime() <= start.getTime()) return null;
  const app = fields[2];
  if (app.trim() === '') return null;
  return { start, end, app, title: fields[3] };
}

export function encodeRecord(interval: ActivityInterval) {
  return [
    interval.start.toISOString(),
    interval.end.toISOString(),
    encodeField(interval.app),
    encodeField(interval.title)
  ].join(',');
}

export type CsvLogStoreOptions = {
  /** Writers take `<log>.lock` and create the file if needed; readers do neither. */
  writable?: boolean;
};

export class CsvLogStore implements LogStore {
  private readonly lockPath: string;
  private readonly writable: boolean;
  private holdsLock = false;
  private closed = false;

  constructor(readonly filePath: string, options: CsvLogStoreOptions = {}) {
    this.lockPath = `${filePath}.lock`;
    this.writable = options.writable ?? false;
    if (this.writable) {
      this.acquireLock();
      try {
        this.prepareForAppend();
      } catch (error) {
        this.releaseLock();
        throw error;
      }
    }
  }

  append(interval: ActivityInterval) {
    if (!this.writable || this.closed) {
      throw new PersistenceError(`Activity log ${this.filePath} is not open for writing`);
    }
    if (interval.end.getTime() <= interval.start.getTime()) {
      throw new RangeError(`Interval for ${interval.app} ends before it starts`);
    }
    try {
      fs.appendFileSync(this.filePath, `${encodeRecord(interval)}\n`, 'utf8');
    } catch (error) {
      throw new PersistenceError(`Failed to append to activity log ${this.filePath}`, { cause: error });
    }
  }

  readAll(range?: DateRange): LogReadResult {
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, 'utf8');
    } catch (error) {
      throw new PersistenceError(`Cannot read activity log ${this.filePath}`, { cause: error });
    }

    const lines = content.split('\n');
    // After a final newline split() leaves an empty string; anything else there is a torn write.
    const tail = lines.pop() ?? '';
    let skipped = 0;
    const intervals: ActivityInterval[] = [];

    lines.forEach((raw, index) => {
      const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
      if (line.trim() === '') return;
      const fields = parseCsvLine(line);
      if (fields && isHeader(fields)) return;
      const interval = fields ? decodeRecord(fields) : null;
      if (!interval) {
        skipped += 1;
        logger.debug(`Malformed record on line ${index + 1} of ${this.filePath}`);
        return;
      }
      if (!range || overlapsRange(interval, range)) {
        intervals.push(interval);
      }
    });

    if (tail.trim() !== '') {
      skipped += 1;
      logger.debug(`Unterminated final record in ${this.filePath}`);
    }
    if (skipped > 0) {
      logger.warn(`Skipped ${skipped} malformed record(s) in ${this.filePath}`);
    }

    return { intervals: sortByStart(intervals), skipped };
  }

  close() {
    if (this.closed) return;
    this.closed = true;
    this.releaseLock();
  }

  private prepareForAppend() {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      const size = fs.existsSync(this.filePath) ? fs.statSync(this.filePath).size : 0;
      if (size === 0) {
        fs.writeFileSync(this.filePath, `${CSV_HEADER.join(',')}\n`, 'utf8');
        logger.info('Created activity log', this.filePath);
        return;
      }
      const fd = fs.openSync(this.filePath, 'r');
      const last = Buffer.alloc(1);
      try {
        fs.readSync(fd, last, 0, 1, size - 1);
      } finally {
        fs.closeSync(fd);
      }
      if (last.toString('utf8') !== '\n') {
        logger.warn('Activity log ends in a partial record; starting a new line', this.filePath);
        fs.appendFileSync(this.filePath, '\n', 'utf8');
      }
    } catch (error) {
      throw new PersistenceError(`Cannot prepare activity log ${this.filePath}`, { cause: error });
    }
  }

  private acquireLock() {
    if (this.createLock()) return;

    const stale = this.readLock();
    const holder = stale === null ? NaN : Number.parseInt(stale, 10);
    if (Number.isInteger(holder) && holder > 0 && isProcessAlive(holder)) {
      throw new PersistenceError(`Activity log ${this.filePath} is already being written by process ${holder}`);
    }

    // Another writer may have replaced the stale lock since it was read.
    if (stale !== null && this.readLock() === stale) {
      logger.warn('Removing stale lock', this.lockPath);
      try {
        fs.unlinkSync(this.lockPath);
      } catch (error) {
        if (!hasErrorCode(error, 'ENOENT')) {
          throw new PersistenceError(`Cannot remove stale lock ${this.lockPath}`, { cause: error });
        }
      }
    }
    if (!this.createLock()) {
      throw new PersistenceError(`Activity log ${this.filePath} was locked by another process during takeover`);
    }
  }

  /** Lock contents, or null once the lock is gone. */
  private readLock(): string | null {
    try {
      return fs.readFileSync(this.lockPath, 'utf8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return null;
      throw new PersistenceError(`Cannot read lock ${this.lockPath}`, { cause: error });
    }
  }

  /** Exclusive create; false when the lock file already exists. */
  private createLock() {
    try {
      fs.writeFileSync(this.lockPath, String(process.pid), { flag: 'wx' });
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) return false;
      throw new PersistenceError(`Cannot lock activity log ${this.filePath}`, { cause: error });
    }
    this.holdsLock = true;
    return true;
  }

  private releaseLock() {
    if (!this.holdsLock) return;
    this.holdsLock = false;
    try {
      fs.unlinkSync(this.lockPath);
    } catch (error) {
      logger.warn('Failed to remove lock file', this.lockPath, error);
    }
  }
}
