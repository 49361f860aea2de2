import fs from 'node:fs';
import path from 'node:path';
import DatabaseDriver, { type Database as BetterSqlite3Database, type Statement } from 'better-sqlite3';
import type { ActivityInterval, DateRange, LogReadResult } from '@shared/types';
import { PersistenceError } from '@shared/errors';
import { logger } from '@shared/logger';
import type { LogStore } from './logStore';

export type DatabaseOptions = {
  /** `:memory:` is accepted for tests. */
  filePath: string;
  readonly?: boolean;
};

type IntervalRow = {
  id: number;
  started_at: string;
  ended_at: string;
  app_name: string;
  window_title: string;
};

/** Interval log kept in a SQLite file instead of CSV. */
export class SqliteLogStore implements LogStore {
  private driver: BetterSqlite3Database;
  private insertStmt: Statement<[string, string, string, string]>;
  private rangeStmt: Statement<[string, string], IntervalRow>;
  private allStmt: Statement<[], IntervalRow>;
  private readonly writable: boolean;

  constructor(private readonly options: DatabaseOptions) {
    this.writable = !options.readonly;
    const inMemory = options.filePath === ':memory:';
    if (!inMemory && !this.writable && !fs.existsSync(options.filePath)) {
      throw new PersistenceError(`Cannot read activity log ${options.filePath}: file does not exist`);
    }
    try {
      if (!inMemory && this.writable) {
        fs.mkdirSync(path.dirname(options.filePath), { recursive: true });
      }
      logger.debug('Opening activity database at', options.filePath);
      this.driver = new DatabaseDriver(options.filePath, { readonly: !this.writable });
      if (this.writable) {
        this.driver.pragma('journal_mode = WAL');
        this.initialise();
      }
      this.insertStmt = this.driver.prepare<[string, string, string, string]>(
        'INSERT INTO intervals (started_at, ended_at, app_name, window_title) VALUES (?, ?, ?, ?)'
      );
      this.rangeStmt = this.driver.prepare<[string, string], IntervalRow>(
        `SELECT id, started_at, ended_at, app_name, window_title FROM intervals
         WHERE started_at < ? AND ended_at > ? ORDER BY started_at ASC, id ASC`
      );
      this.allStmt = this.driver.prepare<[], IntervalRow>(
        'SELECT id, started_at, ended_at, app_name, window_title FROM intervals ORDER BY started_at ASC, id ASC'
      );
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError(`Cannot open activity database ${options.filePath}`, { cause: error });
    }
  }

  private initialise() {
    this.driver.exec(`
      CREATE TABLE IF NOT EXISTS intervals (
        id INTEGER PRIMARY KEY,
        started_at TEXT NOT NULL,
        ended_at TEXT NOT NULL,
        app_name TEXT NOT NULL,
        window_title TEXT NOT NULL DEFAULT ''
      );

      CREATE INDEX IF NOT EXISTS idx_intervals_started_at ON intervals(started_at);
    `);
  }

  append(interval: ActivityInterval) {
    if (!this.writable) {
      throw new PersistenceError(`Activity database ${this.options.filePath} is open read-only`);
    }
    if (interval.end.getTime() <= interval.start.getTime()) {
      throw new RangeError(`Interval for ${interval.app} ends before it starts`);
    }
    try {
      this.insertStmt.run(interval.start.toISOString(), interval.end.toISOString(), interval.app, interval.title);
    } catch (error) {
      throw new PersistenceError(`Failed to append to activity database ${this.options.filePath}`, { cause: error });
    }
  }

  readAll(range?: DateRange): LogReadResult {
    // ISO-8601 UTC strings compare in time order.
    const rows = range
      ? this.rangeStmt.all(range.end.toISOString(), range.start.toISOString())
      : this.allStmt.all();

    let skipped = 0;
    const intervals: ActivityInterval[] = [];
    for (const row of rows) {
      const startMs = Date.parse(row.started_at);
      const endMs = Date.parse(row.ended_at);
      if (!Number.isFinite(startMs) || !Number.isFinite(endMs) || endMs <= startMs) {
        skipped += 1;
        logger.debug('Malformed interval row', row.id);
        continue;
      }
      intervals.push({
        start: new Date(startMs),
        end: new Date(endMs),
        app: row.app_name,
        title: row.window_title
      });
    }
    if (skipped > 0) {
      logger.warn(`Skipped ${skipped} malformed row(s) in ${this.options.filePath}`);
    }
    return { intervals, skipped };
  }

  get connection(): BetterSqlite3Database {
    return this.driver;
  }

  close() {
    if (this.driver.open) this.driver.close();
  }
}
