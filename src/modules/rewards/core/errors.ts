/**
 * Rewards Module - Domain Errors
 */

// ─────────────────────────────────────────────────────────────────────────────
// Error Interfaces
// ─────────────────────────────────────────────────────────────────────────────

export interface DatabaseError {
  readonly type: 'DatabaseError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

/**
 * A spend would make the balance negative.
 */
export interface InsufficientCoinsError {
  readonly type: 'InsufficientCoinsError';
  readonly message: string;
  readonly required: number;
  readonly balance: number;
}

/**
 * The user row vanished between creation and update.
 */
export interface UserNotFoundError {
  readonly type: 'UserNotFoundError';
  readonly message: string;
  readonly userId: number;
}

export type RewardError = DatabaseError | InsufficientCoinsError | UserNotFoundError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createInsufficientCoinsError = (
  required: number,
  balance: number
): InsufficientCoinsError => ({
  type: 'InsufficientCoinsError',
  message: `Not enough coins: ${String(required)} required, ${String(balance)} available`,
  required,
  balance,
});

export const createUserNotFoundError = (userId: number): UserNotFoundError => ({
  type: 'UserNotFoundError',
  message: `User ${String(userId)} not found`,
  userId,
});
