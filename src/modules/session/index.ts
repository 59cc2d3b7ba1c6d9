/**
 * Session Module - Public API
 */

export type { UserSession } from './core/types.js';
export { createSession } from './core/types.js';

export type { SessionStore } from './core/ports.js';

export {
  createMemorySessionStore,
  type MemorySessionStoreOptions,
} from './shell/memory/memory-session-store.js';
