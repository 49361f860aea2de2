import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { CategoryMap } from '@shared/types';
import { CategoryFileError, PersistenceError } from '@shared/errors';
import { logger } from '@shared/logger';

const categoryDocumentSchema = z.record(z.string(), z.string());

/** Where the app → category document lives. */
export interface CategoryStore {
  load(): CategoryMap;
  save(map: CategoryMap): void;
}

/**
 * JSON file store. The file is meant to be edited by hand between runs, so it is
 * read fresh on every `load()` and rewritten whole (via a temp file) on `save()`.
 */
export class JsonCategoryStore implements CategoryStore {
  constructor(readonly filePath: string) { }

  load(): CategoryMap {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, 'utf8');
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        logger.info('No category file yet, starting empty', this.filePath);
        return {};
      }
      throw new PersistenceError(`Cannot read category file ${this.filePath}`, { cause: error });
    }

    if (raw.trim() === '') return {};

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new CategoryFileError(this.filePath, 'not valid JSON', { cause: error });
    }

    const result = categoryDocumentSchema.safeParse(parsed);
    if (!result.success) {
      throw new CategoryFileError(this.filePath, 'expected an object mapping app names to category strings', {
        cause: result.error
      });
    }

    const map: CategoryMap = {};
    for (const [app, category] of Object.entries(result.data)) {
      const label = category.trim();
      if (label === '') {
        logger.warn(`Ignoring empty category for "${app}" in ${this.filePath}`);
        continue;
      }
      map[app] = label;
    }
    return map;
  }

  save(map: CategoryMap) {
    const tmpPath = path.join(path.dirname(this.filePath), `.${path.basename(this.filePath)}.${process.pid}.tmp`);
    try {
      fs.writeFileSync(tmpPath, `${JSON.stringify(map, null, 4)}\n`, 'utf8');
      fs.renameSync(tmpPath, this.filePath);
    } catch (error) {
      fs.rmSync(tmpPath, { force: true });
      throw new PersistenceError(`Cannot write category file ${this.filePath}`, { cause: error });
    }
  }
}

/** Keeps the map in memory only. */
export class MemoryCategoryStore implements CategoryStore {
  saves = 0;

  constructor(private map: CategoryMap = {}) { }

  load(): CategoryMap {
    return { ...this.map };
  }

  save(map: CategoryMap) {
    this.map = { ...map };
    this.saves += 1;
  }
}
