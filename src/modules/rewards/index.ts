/**
 * Rewards Module - Public API
 *
 * The progression ledger: coins, quiz passes, unlocked levels, scenario score and badges.
 */

export type { RewardGrant, QuizCompletionRecord, CoinAdjustment } from './core/types.js';
export { HINT_PRICE } from './core/types.js';

export type {
  RewardError,
  DatabaseError,
  InsufficientCoinsError,
  UserNotFoundError,
} from './core/errors.js';

export { type LedgerDeps } from './core/usecases/refresh-standings.js';
export { grantReward, type GrantRewardInput } from './core/usecases/grant-reward.js';
export {
  recordQuizCompletion,
  type RecordQuizCompletionInput,
} from './core/usecases/record-quiz-completion.js';
export { adjustCoins, type AdjustCoinsInput } from './core/usecases/adjust-coins.js';
