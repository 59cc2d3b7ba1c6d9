/**
 * Users Module - Core Types
 *
 * The persisted player record and the atomic progress changes applied to it.
 */

/**
 * Opaque numeric user id assigned by the messaging transport.
 */
export type UserId = number;

/**
 * Display identity reported by the transport with each event.
 */
export interface UserIdentity {
  username: string | null;
  firstName: string | null;
  lastName: string | null;
}

export interface UserProfile extends UserIdentity {
  id: UserId;
  coins: number;
  quizzesPassed: number;
  /** Highest quiz level the user may start. Never decreases. */
  maxUnlockedLevel: number;
  /** Sum of scenario rewards. Never decreases. */
  scenarioScore: number;
  /** Sorted, de-duplicated badge ids */
  scenarioBadges: string[];
  /** Receives periodic safety tips */
  subscribed: boolean;
  createdAt: Date;
}

export interface EnsureUserResult {
  user: UserProfile;
  created: boolean;
}

/**
 * One atomic change to a user's progress. Omitted fields leave the column untouched.
 */
export interface ProgressDelta {
  /** Added to coins; a change that would make coins negative is rejected */
  coins?: number;
  quizzesPassed?: number;
  scenarioScore?: number;
  /** Raises maxUnlockedLevel to at least this level */
  unlockLevel?: number;
  /** Added to the badge set */
  badge?: string;
}

export const EMPTY_IDENTITY: UserIdentity = {
  username: null,
  firstName: null,
  lastName: null,
};
