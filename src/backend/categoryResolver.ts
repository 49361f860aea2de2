import type { CategoryMap } from '@shared/types';
import { PersistenceError, UnresolvedCategoryError } from '@shared/errors';
import { logger } from '@shared/logger';
import type { CategoryStore } from './categoryStore';
import { DEFAULT_MAX_PROMPT_ATTEMPTS } from './defaults';

/**
 * Decides the category of an app the map has never seen. Usually a terminal
 * prompt; any strategy works. An empty answer or a rejection is retried.
 */
export type UnknownAppHandler = (app: string, knownCategories: string[]) => string | Promise<string>;

export type CategoryResolverOptions = {
  onUnknown: UnknownAppHandler;
  maxAttempts?: number;
  /** Rethrow save failures instead of carrying on with an in-memory mapping. */
  requireDurable?: boolean;
  onPersistFailure?: (app: string, error: PersistenceError) => void;
};

export class CategoryResolver {
  private readonly map: Map<string, string>;
  private readonly pending = new Map<string, Promise<string>>();
  private readonly unsaved = new Set<string>();

  constructor(
    private readonly store: CategoryStore,
    initial: CategoryMap,
    private readonly options: CategoryResolverOptions
  ) {
    this.map = new Map(Object.entries(initial));
  }

  static load(store: CategoryStore, options: CategoryResolverOptions) {
    return new CategoryResolver(store, store.load(), options);
  }

  async resolve(app: string): Promise<string> {
    const known = this.map.get(app);
    if (known !== undefined) return known;

    const inflight = this.pending.get(app);
    if (inflight) return inflight;

    const task = this.ask(app).finally(() => this.pending.delete(app));
    this.pending.set(app, task);
    return task;
  }

  editMapping(app: string, category: string) {
    const label = category.trim();
    if (app.trim() === '') throw new Error('App name must not be empty');
    if (label === '') throw new Error(`Category for "${app}" must not be empty`);
    this.map.set(app, label);
    this.persist(app);
  }

  categories(): string[] {
    return [...new Set(this.map.values())].sort((a, b) => a.localeCompare(b));
  }

  snapshot(): CategoryMap {
    return Object.fromEntries(this.map);
  }

  /** Apps whose mapping only lives in memory because the last save failed. */
  get nonDurable(): ReadonlySet<string> {
    return this.unsaved;
  }

  private async ask(app: string): Promise<string> {
    const maxAttempts = Math.max(1, this.options.maxAttempts ?? DEFAULT_MAX_PROMPT_ATTEMPTS);
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      let answer: string;
      try {
        answer = (await this.options.onUnknown(app, this.categories())).trim();
      } catch (error) {
        lastError = error;
        logger.warn(`Category prompt for "${app}" failed (attempt ${attempt}/${maxAttempts})`, error);
        continue;
      }
      if (answer === '') {
        logger.warn(`Empty category for "${app}" (attempt ${attempt}/${maxAttempts})`);
        continue;
      }
      this.map.set(app, answer);
      this.persist(app);
      return answer;
    }

    throw new UnresolvedCategoryError(app, maxAttempts, { cause: lastError });
  }

  private persist(app: string) {
    try {
      this.store.save(this.snapshot());
      this.unsaved.clear();
    } catch (error) {
      const failure = error instanceof PersistenceError
        ? error
        : new PersistenceError('Failed to save category mapping', { cause: error });
      if (this.options.requireDurable) throw failure;
      this.unsaved.add(app);
      if (this.options.onPersistFailure) {
        this.options.onPersistFailure(app, failure);
      } else {
        logger.warn(`Category for "${app}" is kept for this run only: ${failure.message}`);
      }
    }
  }
}
