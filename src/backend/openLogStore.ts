import type { LogReadResult } from '@shared/types';
import type { LogStore } from './logStore';
import { logStoreKindFor } from './logStore';
import { CsvLogStore } from './csvLogStore';
import { SqliteLogStore } from './storage';

/** Picks the backend from the file extension: `.db`/`.sqlite` for SQLite, CSV otherwise. */
export function openLogStore(filePath: string, options: { writable: boolean }): LogStore {
  if (logStoreKindFor(filePath) === 'sqlite') {
    return new SqliteLogStore({ filePath, readonly: !options.writable });
  }
  return new CsvLogStore(filePath, { writable: options.writable });
}

export function readLog(filePath: string): LogReadResult {
  const store = openLogStore(filePath, { writable: false });
  try {
    return store.readAll();
  } finally {
    store.close();
  }
}
