import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { titleActivityKey } from '../src/backend/activityKey';
import { runAnalysis } from '../src/backend/analysis';
import type { CategoryStore } from '../src/backend/categoryStore';
import { DateRangeError, PersistenceError } from '../src/shared/errors';
import { setLogLevel } from '../src/shared/logger';
import { parseDateExpression } from '../src/shared/time';

const LOG_LINES = [
  'start,end,app_name,window_title',
  '2024-01-15T09:00:00.000Z,2024-01-15T10:00:00.000Z,Chrome,Docs',
  '2024-01-15T10:00:00.000Z,2024-01-15T10:30:00.000Z,Code,main.ts',
  'garbage line',
  ''
];

class UnwritableStore implements CategoryStore {
  load() {
    return { Chrome: 'browsing' };
  }

  save(): void {
    throw new PersistenceError('Cannot write category file app_categories.json');
  }
}

describe('runAnalysis', () => {
  let dir: string;
  let logFile: string;
  let categoryFile: string;
  const day = parseDateExpression('2024-01-15');

  beforeEach(() => {
    setLogLevel('error');
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'focus-ledger-analysis-'));
    logFile = path.join(dir, 'activity_log.csv');
    categoryFile = path.join(dir, 'app_categories.json');
    fs.writeFileSync(logFile, LOG_LINES.join('\n'));
    fs.writeFileSync(categoryFile, JSON.stringify({ Chrome: 'browsing' }));
  });

  afterEach(() => {
    setLogLevel('info');
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('asks for unknown apps, saves the answer and aggregates the day', async () => {
    const onUnknown = vi.fn(() => 'programming');

    const outcome = await runAnalysis({ logFile, categories: categoryFile, range: day, onUnknown });

    expect(onUnknown).toHaveBeenCalledTimes(1);
    expect(onUnknown).toHaveBeenCalledWith('Code', ['browsing']);
    expect(outcome.result.totalsByCategory).toEqual({ browsing: 3600, programming: 1800 });
    expect(outcome.result.topApps).toEqual([
      { app: 'Chrome', seconds: 3600 },
      { app: 'Code', seconds: 1800 }
    ]);
    expect(outcome.skipped).toBe(1);
    expect(outcome.nonDurable).toEqual([]);
    expect(JSON.parse(fs.readFileSync(categoryFile, 'utf8'))).toEqual({ Chrome: 'browsing', Code: 'programming' });
  });

  it('applies explicit edits before aggregating', async () => {
    const onUnknown = vi.fn(() => 'unused');

    const outcome = await runAnalysis({
      logFile,
      categories: categoryFile,
      range: day,
      onUnknown,
      edits: [
        { app: 'Chrome', category: 'research' },
        { app: 'Code', category: 'programming' }
      ]
    });

    expect(onUnknown).not.toHaveBeenCalled();
    expect(outcome.result.totalsByCategory).toEqual({ research: 3600, programming: 1800 });
    expect(JSON.parse(fs.readFileSync(categoryFile, 'utf8'))).toEqual({ Chrome: 'research', Code: 'programming' });
  });

  it('passes duration and top-app limits through', async () => {
    const outcome = await runAnalysis({
      logFile,
      categories: categoryFile,
      range: day,
      onUnknown: () => 'programming',
      minDurationSeconds: 1800,
      topN: 1
    });

    expect(outcome.result.totalsByApp).toEqual({ Chrome: 3600, Code: 1800 });
    expect(outcome.result.topApps).toEqual([{ app: 'Chrome', seconds: 3600 }]);
  });

  it('says which days the log covers when the range has no activity', async () => {
    await expect(
      runAnalysis({ logFile, categories: categoryFile, range: parseDateExpression('2024-01-20'), onUnknown: () => 'x' })
    ).rejects.toThrow('No activity recorded for 2024-01-20 (log covers 2024-01-15 to 2024-01-15)');
  });

  it('parses a date expression against the given clock', async () => {
    const outcome = await runAnalysis({
      logFile,
      categories: categoryFile,
      range: 'today',
      now: new Date(2024, 0, 15, 18),
      onUnknown: () => 'programming'
    });

    expect(outcome.result.totalSeconds).toBe(5400);
  });

  it('reports a reversed range along with the days the log covers', async () => {
    const failure = runAnalysis({
      logFile,
      categories: categoryFile,
      range: '2024-01-20..2024-01-10',
      onUnknown: () => 'x'
    });

    await expect(failure).rejects.toThrow(DateRangeError);
    await expect(failure).rejects.toThrow(
      'Invalid date range "2024-01-20..2024-01-10": range end is before its start (log covers 2024-01-15 to 2024-01-15)'
    );
  });

  it('reports an impossible date along with the days the log covers', async () => {
    await expect(
      runAnalysis({ logFile, categories: categoryFile, range: '2024-02-30', onUnknown: () => 'x' })
    ).rejects.toThrow(
      'Invalid date range "2024-02-30": 2024-02-30 is not a calendar date (log covers 2024-01-15 to 2024-01-15)'
    );
  });

  it('fails when every interval in range is shorter than the minimum duration', async () => {
    const onUnknown = vi.fn(() => 'programming');
    const failure = runAnalysis({
      logFile,
      categories: categoryFile,
      range: day,
      onUnknown,
      minDurationSeconds: 7200
    });

    await expect(failure).rejects.toThrow(DateRangeError);
    await expect(failure).rejects.toThrow(
      'No activity of at least 7200s recorded for 2024-01-15 (log covers 2024-01-15 to 2024-01-15)'
    );
    expect(onUnknown).not.toHaveBeenCalled();
  });

  it('stores categories under title-derived keys when asked to', async () => {
    const onUnknown = vi.fn(() => 'programming');

    const outcome = await runAnalysis({
      logFile,
      categories: categoryFile,
      range: day,
      onUnknown,
      activityKey: titleActivityKey
    });

    expect(onUnknown).toHaveBeenCalledWith('VSCode - main.ts', ['browsing']);
    expect(outcome.result.totalsByCategory).toEqual({ browsing: 3600, programming: 1800 });
    expect(outcome.result.totalsByApp).toEqual({ Chrome: 3600, Code: 1800 });
    expect(JSON.parse(fs.readFileSync(categoryFile, 'utf8'))).toEqual({
      Chrome: 'browsing',
      'VSCode - main.ts': 'programming'
    });
  });

  it('reports an empty log', async () => {
    fs.writeFileSync(logFile, 'start,end,app_name,window_title\n');
    const failure = runAnalysis({ logFile, categories: categoryFile, range: day, onUnknown: () => 'x' });

    await expect(failure).rejects.toThrow(DateRangeError);
    await expect(failure).rejects.toThrow('No activity recorded for 2024-01-15 (log is empty)');
  });

  it('fails when the log file is missing', async () => {
    await expect(
      runAnalysis({ logFile: path.join(dir, 'nope.csv'), categories: categoryFile, range: day, onUnknown: () => 'x' })
    ).rejects.toThrow(PersistenceError);
  });

  it('carries on with an unsaved category unless durability is required', async () => {
    const outcome = await runAnalysis({
      logFile,
      categories: new UnwritableStore(),
      range: day,
      onUnknown: () => 'programming'
    });
    expect(outcome.nonDurable).toEqual(['Code']);
    expect(outcome.result.totalsByCategory).toEqual({ browsing: 3600, programming: 1800 });

    await expect(
      runAnalysis({
        logFile,
        categories: new UnwritableStore(),
        range: day,
        onUnknown: () => 'programming',
        requireDurable: true
      })
    ).rejects.toThrow('Cannot write category file app_categories.json');
  });
});
