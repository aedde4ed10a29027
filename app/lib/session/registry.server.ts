/**
 * Registry of live session stores, keyed by the id kept in the session cookie.
 *
 * Stores are held in an LRU with an idle TTL; a store that is evicted, expires
 * or is destroyed at sign-out is cleared before it is dropped.
 */

import { randomUUID } from "crypto";
import { LRUCache } from "lru-cache";
import { systemClock, type Clock } from "~/lib/clock";
import { env } from "~/lib/env.server";
import { createLogger } from "~/lib/logger.server";
import { ResponseCache } from "./cache.server";
import { SessionStateStore } from "./state.server";

const logger = createLogger("Sessions");

const DEFAULT_MAX_SESSIONS = 1000;
const DEFAULT_MAX_GLOBAL_RESPONSES = 5000;

export interface SessionRegistryOptions {
  maxSessions?: number;
  /** Capacity of the shared response cache */
  maxGlobalResponses?: number;
  idleTtlMs?: number;
  clock?: Clock;
  createId?: () => string;
}

export class SessionRegistry {
  private readonly stores: LRUCache<string, SessionStateStore>;
  private readonly clock: Clock;
  private readonly createId: () => string;
  /** Shared by every store for trending, search and details */
  readonly globalCache: ResponseCache;

  constructor(options: SessionRegistryOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.createId = options.createId ?? randomUUID;
    this.globalCache = new ResponseCache(
      this.clock,
      options.maxGlobalResponses ?? DEFAULT_MAX_GLOBAL_RESPONSES
    );
    this.stores = new LRUCache<string, SessionStateStore>({
      max: options.maxSessions ?? DEFAULT_MAX_SESSIONS,
      ttl: options.idleTtlMs ?? env.SESSION_IDLE_MINUTES * 60 * 1000,
      updateAgeOnGet: true,
      dispose: (store, id, reason) => {
        store.clearOnSignOut();
        logger.info(`Session ${id} torn down`, { reason });
      },
    });
  }

  /**
   * Start a new session with an empty store.
   */
  create(): SessionStateStore {
    const id = this.createId();
    const store = new SessionStateStore(id, {
      globalCache: this.globalCache,
      clock: this.clock,
    });
    this.stores.set(id, store);
    logger.info(`Session ${id} created`, { active: this.stores.size });
    return store;
  }

  get(id: string): SessionStateStore | null {
    return this.stores.get(id) ?? null;
  }

  /**
   * Tear down a session. Returns false when it was already gone.
   */
  destroy(id: string): boolean {
    return this.stores.delete(id);
  }

  get size(): number {
    return this.stores.size;
  }
}

let registry: SessionRegistry | null = null;

/**
 * Registry used by the running server.
 */
export function getSessionRegistry(): SessionRegistry {
  if (!registry) {
    registry = new SessionRegistry();
  }
  return registry;
}
