/**
 * In-memory session store with idle expiry and LRU eviction.
 */

import type { SessionStore } from '../../core/ports.js';
import type { UserSession } from '../../core/types.js';
import type { UserId } from '../../../users/index.js';

interface SessionEntry {
  session: UserSession;
  /** Expiration timestamp (ms since epoch), pushed forward on every access */
  expiresAt: number;
}

export interface MemorySessionStoreOptions {
  /** Idle time after which a session is dropped */
  idleTtlMs: number;
  /** Maximum number of sessions. The least recently used one is evicted first. */
  maxEntries: number;
  /** Clock override for tests */
  now?: () => number;
}

export const createMemorySessionStore = (options: MemorySessionStoreOptions): SessionStore => {
  const { idleTtlMs, maxEntries } = options;
  const now = options.now ?? Date.now;

  // Map maintains insertion order, enabling LRU eviction
  const store = new Map<UserId, SessionEntry>();

  const isExpired = (entry: SessionEntry): boolean => now() >= entry.expiresAt;

  const evictLru = (): void => {
    const lruKey = store.keys().next().value;
    if (lruKey !== undefined) {
      store.delete(lruKey);
    }
  };

  const touch = (userId: UserId, session: UserSession): void => {
    store.delete(userId);
    store.set(userId, { session, expiresAt: now() + idleTtlMs });
  };

  return {
    get(userId) {
      const entry = store.get(userId);
      if (entry === undefined) {
        return undefined;
      }
      if (isExpired(entry)) {
        store.delete(userId);
        return undefined;
      }
      touch(userId, entry.session);
      return entry.session;
    },

    set(session) {
      if (!store.has(session.userId) && store.size >= maxEntries) {
        evictLru();
      }
      touch(session.userId, session);
    },

    delete(userId) {
      return store.delete(userId);
    },

    sweep() {
      let removed = 0;
      for (const [userId, entry] of store) {
        if (isExpired(entry)) {
          store.delete(userId);
          removed++;
        }
      }
      return removed;
    },

    get size() {
      return store.size;
    },
  };
};
