/**
 * Slash command parsing.
 */

import { isLeaderboardPeriod, type LeaderboardPeriod } from '../../leaderboard/index.js';

export type Command =
  | { name: 'start'; referralCode: string | null }
  | { name: 'menu' }
  | { name: 'quiz' }
  | { name: 'scenarios' }
  | { name: 'leaderboard'; period: LeaderboardPeriod }
  | { name: 'balance' }
  | { name: 'referral' }
  | { name: 'subscribe' }
  | { name: 'unsubscribe' }
  | { name: 'help' }
  | { name: 'lessons' }
  | { name: 'report' }
  | { name: 'cancel' }
  | { name: 'unknown'; raw: string };

/**
 * Parses `/name[@bot] [args]`. Returns null for text that is not a command.
 */
export const parseCommand = (body: string): Command | null => {
  const trimmed = body.trim();
  if (!trimmed.startsWith('/')) {
    return null;
  }

  const [head = '', ...args] = trimmed.split(/\s+/);
  const name = (head.slice(1).split('@')[0] ?? '').toLowerCase();
  const firstArg = args[0];

  switch (name) {
    case 'start':
      return { name: 'start', referralCode: firstArg !== undefined && firstArg !== '' ? firstArg : null };
    case 'menu':
      return { name: 'menu' };
    case 'quiz':
      return { name: 'quiz' };
    case 'scenarios':
      return { name: 'scenarios' };
    case 'leaderboard': {
      const period = firstArg?.toLowerCase();
      return {
        name: 'leaderboard',
        period: period !== undefined && isLeaderboardPeriod(period) ? period : 'all_time',
      };
    }
    case 'balance':
      return { name: 'balance' };
    case 'referral':
      return { name: 'referral' };
    case 'subscribe':
      return { name: 'subscribe' };
    case 'unsubscribe':
      return { name: 'unsubscribe' };
    case 'help':
      return { name: 'help' };
    case 'lessons':
    case 'education':
      return { name: 'lessons' };
    case 'report':
      return { name: 'report' };
    case 'cancel':
      return { name: 'cancel' };
    default:
      return { name: 'unknown', raw: head };
  }
};
