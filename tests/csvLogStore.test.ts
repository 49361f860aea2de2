import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CsvLogStore, encodeField, encodeRecord, parseCsvLine, parseTimestamp } from '../src/backend/csvLogStore';
import { PersistenceError } from '../src/shared/errors';
import { setLogLevel } from '../src/shared/logger';
import type { ActivityInterval } from '../src/shared/types';

const iso = (value: string) => new Date(value);

const chromeDocs: ActivityInterval = {
  start: iso('2024-01-15T09:00:00.000Z'),
  end: iso('2024-01-15T09:10:00.000Z'),
  app: 'Chrome',
  title: 'Docs'
};
const codeMain: ActivityInterval = {
  start: iso('2024-01-15T09:10:00.000Z'),
  end: iso('2024-01-15T09:30:00.000Z'),
  app: 'Code',
  title: 'main.ts'
};

describe('CSV encoding', () => {
  it('quotes fields with commas or quotes and flattens line breaks', () => {
    expect(encodeField('plain')).toBe('plain');
    expect(encodeField('Acme, Inc.')).toBe('"Acme, Inc."');
    expect(encodeField('say "hi"')).toBe('"say ""hi"""');
    expect(encodeField('line1\r\nline2')).toBe('line1 line2');
  });

  it('writes one line per interval with ISO timestamps', () => {
    expect(encodeRecord({ ...chromeDocs, app: 'Acme, Inc.', title: 'say "hi"' })).toBe(
      '2024-01-15T09:00:00.000Z,2024-01-15T09:10:00.000Z,"Acme, Inc.","say ""hi"""'
    );
  });

  it('splits quoted and empty fields', () => {
    expect(parseCsvLine('a,"b,c","d ""e""",')).toEqual(['a', 'b,c', 'd "e"', '']);
    expect(parseCsvLine('a,"open')).toBeNull();
    expect(parseCsvLine('"a"b,c')).toBeNull();
  });

  it('reads ISO and epoch-second timestamps', () => {
    expect(parseTimestamp('1705309200')).toEqual(iso('2024-01-15T09:00:00.000Z'));
    expect(parseTimestamp('2024-01-15T09:00:00.000Z')).toEqual(iso('2024-01-15T09:00:00.000Z'));
    expect(parseTimestamp('soon')).toBeNull();
    expect(parseTimestamp('  ')).toBeNull();
  });
});

describe('CsvLogStore', () => {
  let dir: string;
  let logPath: string;

  beforeEach(() => {
    setLogLevel('error');
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'focus-ledger-csv-'));
    logPath = path.join(dir, 'activity_log.csv');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel('info');
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('creates the file with a header and takes a lock while writing', () => {
    const store = new CsvLogStore(path.join(dir, 'nested', 'log.csv'), { writable: true });

    expect(fs.readFileSync(path.join(dir, 'nested', 'log.csv'), 'utf8')).toBe('start,end,app_name,window_title\n');
    expect(fs.readFileSync(path.join(dir, 'nested', 'log.csv.lock'), 'utf8')).toBe(String(process.pid));

    store.close();
    expect(fs.existsSync(path.join(dir, 'nested', 'log.csv.lock'))).toBe(false);
  });

  it('reads back what it appended, ordered by start', () => {
    const writer = new CsvLogStore(logPath, { writable: true });
    const tricky: ActivityInterval = {
      start: iso('2024-01-15T08:00:00.000Z'),
      end: iso('2024-01-15T08:05:00.000Z'),
      app: 'Acme, Inc.',
      title: 'say "hi"'
    };
    writer.append(codeMain);
    writer.append(chromeDocs);
    writer.append(tricky);
    writer.close();

    const reader = new CsvLogStore(logPath);
    expect(reader.readAll()).toEqual({ intervals: [tricky, chromeDocs, codeMain], skipped: 0 });
  });

  it('stores a multi-line title on a single line', () => {
    const writer = new CsvLogStore(logPath, { writable: true });
    writer.append({ ...chromeDocs, title: 'first\nsecond' });
    writer.close();

    expect(fs.readFileSync(logPath, 'utf8').split('\n')).toHaveLength(3);
    expect(new CsvLogStore(logPath).readAll().intervals[0].title).toBe('first second');
  });

  it('skips malformed records and counts them', () => {
    fs.writeFileSync(
      logPath,
      [
        'start,end,app_name,window_title',
        '2024-01-15T09:00:00.000Z,2024-01-15T09:10:00.000Z,Chrome,Docs',
        'not-a-date,2024-01-15T09:10:00.000Z,Chrome,Docs',
        '2024-01-15T09:10:00.000Z,2024-01-15T09:05:00.000Z,Code,backwards',
        '2024-01-15T09:10:00.000Z,2024-01-15T09:20:00.000Z',
        '2024-01-15T09:10:00.000Z,2024-01-15T09:20:00.000Z,"unterminated,x',
        ''
      ].join('\n')
    );

    expect(new CsvLogStore(logPath).readAll()).toEqual({ intervals: [chromeDocs], skipped: 4 });
  });

  it('ignores columns past the fourth and accepts epoch seconds', () => {
    fs.writeFileSync(
      logPath,
      'start,end,app_name,window_title,extra\n1705309200,1705309800,Chrome,Docs,ignored\n'
    );

    expect(new CsvLogStore(logPath).readAll()).toEqual({ intervals: [chromeDocs], skipped: 0 });
  });

  it('repairs a torn final record before appending', () => {
    fs.writeFileSync(
      logPath,
      'start,end,app_name,window_title\n2024-01-15T09:00:00.000Z,2024-01-15T09:10:00.000Z,Chrome,Docs\n2024-01-15T09:1'
    );
    expect(new CsvLogStore(logPath).readAll()).toEqual({ intervals: [chromeDocs], skipped: 1 });

    const writer = new CsvLogStore(logPath, { writable: true });
    writer.append(codeMain);
    writer.close();

    expect(new CsvLogStore(logPath).readAll()).toEqual({ intervals: [chromeDocs, codeMain], skipped: 1 });
  });

  it('filters to intervals overlapping a range', () => {
    const writer = new CsvLogStore(logPath, { writable: true });
    writer.append(chromeDocs);
    writer.append(codeMain);
    writer.close();

    const result = new CsvLogStore(logPath).readAll({
      start: iso('2024-01-15T09:15:00.000Z'),
      end: iso('2024-01-15T10:00:00.000Z')
    });
    expect(result.intervals).toEqual([codeMain]);
  });

  it('refuses a second writer while the first holds the lock', () => {
    const first = new CsvLogStore(logPath, { writable: true });

    expect(() => new CsvLogStore(logPath, { writable: true })).toThrow(
      `Activity log ${logPath} is already being written by process ${process.pid}`
    );

    first.close();
    const second = new CsvLogStore(logPath, { writable: true });
    second.close();
  });

  it('takes over a lock left by a process that is gone', () => {
    fs.writeFileSync(`${logPath}.lock`, '999999999');

    const store = new CsvLogStore(logPath, { writable: true });
    expect(fs.readFileSync(`${logPath}.lock`, 'utf8')).toBe(String(process.pid));
    store.close();
  });

  it('backs off when another writer claims a stale lock first', () => {
    const lockPath = `${logPath}.lock`;
    fs.writeFileSync(lockPath, '999999999');
    const unlink = fs.unlinkSync;
    vi.spyOn(fs, 'unlinkSync').mockImplementationOnce((target) => {
      unlink(target);
      fs.writeFileSync(target, String(process.pid));
    });

    expect(() => new CsvLogStore(logPath, { writable: true })).toThrow(
      `Activity log ${logPath} was locked by another process during takeover`
    );
    expect(fs.readFileSync(lockPath, 'utf8')).toBe(String(process.pid));
  });

  it('rejects appends on a reader and reports a missing file', () => {
    const reader = new CsvLogStore(logPath);
    expect(() => reader.append(chromeDocs)).toThrow(PersistenceError);
    expect(() => reader.readAll()).toThrow(`Cannot read activity log ${logPath}`);
  });

  it('rejects an interval that does not end after it starts', () => {
    const writer = new CsvLogStore(logPath, { writable: true });
    expect(() => writer.append({ ...chromeDocs, end: chromeDocs.start })).toThrow(RangeError);
    writer.close();
  });
});
