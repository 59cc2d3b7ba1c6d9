/**
 * Leaderboard Module - Domain Errors
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

export interface UserNotFoundError {
  readonly type: 'UserNotFoundError';
  readonly message: string;
  readonly userId: number;
}

export interface InvalidLeaderboardQueryError {
  readonly type: 'InvalidLeaderboardQueryError';
  readonly message: string;
}

export type LeaderboardError = DatabaseError | UserNotFoundError | InvalidLeaderboardQueryError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createDatabaseError = (message: string, cause?: unknown): DatabaseError => ({
  type: 'DatabaseError',
  message,
  retryable: true,
  cause,
});

export const createUserNotFoundError = (userId: number): UserNotFoundError => ({
  type: 'UserNotFoundError',
  message: `User ${String(userId)} not found`,
  userId,
});

export const createInvalidLeaderboardQueryError = (
  message: string
): InvalidLeaderboardQueryError => ({
  type: 'InvalidLeaderboardQueryError',
  message,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const LEADERBOARD_ERROR_HTTP_STATUS: Record<LeaderboardError['type'], number> = {
  DatabaseError: 500,
  UserNotFoundError: 404,
  InvalidLeaderboardQueryError: 400,
};

export const getHttpStatusForError = (error: LeaderboardError): number => {
  return LEADERBOARD_ERROR_HTTP_STATUS[error.type];
};
