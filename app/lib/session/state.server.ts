/**
 * Per-session state: transient UI selections plus read-through caching of
 * external service responses.
 *
 * One store exists per browser session. It is created at sign-in by the
 * SessionRegistry and handed to loaders and actions through requireUser().
 */

import { systemClock, type Clock } from "~/lib/clock";
import type { ServiceResult } from "~/lib/errors";
import { createLogger } from "~/lib/logger.server";
import { ResponseCache } from "./cache.server";
import {
  isSelectionField,
  type CacheScope,
  type SelectionField,
  type SessionSelections,
} from "./types";

const logger = createLogger("SessionState");

export interface SessionStateStoreOptions {
  /** Cache shared by every session, for data that is not personalized */
  globalCache?: ResponseCache;
  clock?: Clock;
}

export class SessionStateStore {
  readonly id: string;
  private readonly selections: Partial<SessionSelections> = {};
  private readonly userCache: ResponseCache;
  private readonly globalCache: ResponseCache;

  constructor(id: string, options: SessionStateStoreOptions = {}) {
    const clock = options.clock ?? systemClock;
    this.id = id;
    this.userCache = new ResponseCache(clock);
    this.globalCache = options.globalCache ?? new ResponseCache(clock);
  }

  private cacheFor(scope: CacheScope): ResponseCache {
    return scope === "global" ? this.globalCache : this.userCache;
  }

  /**
   * Return the cached value for `key` while it is younger than `ttlSeconds`,
   * otherwise call `fetchFn` and cache a successful result.
   *
   * Failures are returned unchanged and never cached; an exception thrown by
   * `fetchFn` propagates and leaves the cache untouched.
   */
  async getOrFetch<T>(
    key: string,
    fetchFn: () => Promise<ServiceResult<T>>,
    ttlSeconds: number,
    scope: CacheScope = "user"
  ): Promise<ServiceResult<T>> {
    const cache = this.cacheFor(scope);
    const cached = cache.get<T>(key, ttlSeconds);
    if (cached !== undefined) {
      logger.debug(`Cache HIT ${scope}:${key}`);
      return { success: true, data: cached };
    }

    logger.debug(`Cache MISS ${scope}:${key}`);
    const result = await fetchFn();
    if (result.success) {
      cache.set(key, result.data);
    } else {
      logger.warn(`Fetch failed for ${scope}:${key}`, {
        kind: result.error.kind,
        message: result.error.message,
      });
    }
    return result;
  }

  setSelection<K extends SelectionField>(field: K, value: SessionSelections[K]): void {
    assertSelectionField(field);
    this.selections[field] = value;
  }

  getSelection<K extends SelectionField>(field: K): SessionSelections[K] | undefined {
    assertSelectionField(field);
    return this.selections[field];
  }

  clearSelection(field: SelectionField): void {
    assertSelectionField(field);
    delete this.selections[field];
  }

  /**
   * Forget the signed-in user: identity, their selections and every
   * user-scoped cache entry. Global entries are left alone.
   */
  clearOnSignOut(): void {
    const identity = this.selections.identity?.identity;
    delete this.selections.identity;
    delete this.selections.selectedMedia;
    delete this.selections.lastAiResult;
    const dropped = this.userCache.size;
    this.userCache.clear();
    logger.info(`Cleared session ${this.id}`, {
      identity: identity ?? null,
      droppedEntries: dropped,
    });
  }

  /** Number of user-scoped entries held, expired ones included. */
  get userCacheSize(): number {
    return this.userCache.size;
  }
}

function assertSelectionField(field: string): void {
  if (!isSelectionField(field)) {
    throw new Error(`Unknown session field: ${field}`);
  }
}
