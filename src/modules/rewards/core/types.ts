/**
 * Rewards Module - Core Types
 */

import type { QuizCompletion } from '../../quiz/index.js';
import type { UserProfile } from '../../users/index.js';

export const HINT_PRICE = 20;

/**
 * What a single grant changed.
 */
export interface RewardGrant {
  coinsGranted: number;
  /** Null when no badge was requested or it was already held */
  badgeGranted: string | null;
  /** Scenario score after the grant */
  newScore: number;
  allBadges: string[];
}

export interface QuizCompletionRecord {
  completion: QuizCompletion;
  user: UserProfile;
}

export interface CoinAdjustment {
  delta: number;
  balance: number;
}
