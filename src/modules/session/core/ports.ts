/**
 * Session Module - Ports
 */

import type { UserSession } from './types.js';
import type { UserId } from '../../users/index.js';

export interface SessionStore {
  /** Returns the live session, or undefined when absent or idle past the TTL */
  get(userId: UserId): UserSession | undefined;

  /** Stores the session and marks it as recently used */
  set(session: UserSession): void;

  delete(userId: UserId): boolean;

  /** Drops every idle session. Returns how many were removed. */
  sweep(): number;

  readonly size: number;
}
