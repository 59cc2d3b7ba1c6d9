/**
 * Pure helpers over user records.
 */

import type { UserId, UserIdentity } from './types.js';

/**
 * Name shown on leaderboards: @username, else first and last name, else a generic label.
 */
export const getDisplayName = (user: UserIdentity & { id: UserId }): string => {
  if (user.username !== null && user.username !== '') {
    return `@${user.username}`;
  }
  const fullName = [user.firstName, user.lastName]
    .filter((part): part is string => part !== null && part !== '')
    .join(' ');
  return fullName !== '' ? fullName : `User ${String(user.id)}`;
};
