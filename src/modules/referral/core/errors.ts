/**
 * Referral Module - Domain Errors
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
 * Unknown code, or a user trying to redeem their own code.
 */
export interface InvalidReferralCodeError {
  readonly type: 'InvalidReferralCodeError';
  readonly message: string;
  readonly code: string;
}

/**
 * The code was already redeemed.
 */
export interface ReferralAlreadyUsedError {
  readonly type: 'ReferralAlreadyUsedError';
  readonly message: string;
  readonly code: string;
}

/**
 * A freshly generated code already exists.
 */
export interface CodeCollisionError {
  readonly type: 'CodeCollisionError';
  readonly message: string;
  readonly code: string;
}

/**
 * A bonus could not be credited after the referral was completed.
 */
export interface BonusFailedError {
  readonly type: 'BonusFailedError';
  readonly message: string;
  readonly userId: number;
  readonly cause?: unknown;
}

export type ReferralError =
  | DatabaseError
  | InvalidReferralCodeError
  | ReferralAlreadyUsedError
  | CodeCollisionError
  | BonusFailedError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createDatabaseError = (message: string, cause?: unknown): DatabaseError => ({
  type: 'DatabaseError',
  message,
  retryable: true,
  cause,
});

export const createInvalidReferralCodeError = (
  code: string,
  reason: string
): InvalidReferralCodeError => ({
  type: 'InvalidReferralCodeError',
  message: `Referral code '${code}' is invalid: ${reason}`,
  code,
});

export const createReferralAlreadyUsedError = (code: string): ReferralAlreadyUsedError => ({
  type: 'ReferralAlreadyUsedError',
  message: `Referral code '${code}' was already used`,
  code,
});

export const createCodeCollisionError = (code: string): CodeCollisionError => ({
  type: 'CodeCollisionError',
  message: `Referral code '${code}' already exists`,
  code,
});

export const createBonusFailedError = (
  userId: number,
  cause?: unknown
): BonusFailedError => ({
  type: 'BonusFailedError',
  message: `Referral bonus for user ${String(userId)} could not be credited`,
  userId,
  cause,
});
