/**
 * Shared handler dependencies and helpers.
 */

import { trackEvent } from '../../../analytics/index.js';
import { createStoreError, type ConversationError, type StoreError } from '../errors.js';

import type { MessagingGateway } from '../ports.js';
import type { Turn, ViewModel } from '../types.js';
import type { KeyedMutex } from '../../../../common/utils/keyed-mutex.js';
import type { TrackEventDeps, UserEvent } from '../../../analytics/index.js';
import type { ContentCatalog } from '../../../content/index.js';
import type { GetOrCreateCodeDeps } from '../../../referral/index.js';
import type { ReportRepository } from '../../../reports/index.js';
import type { LedgerDeps } from '../../../rewards/index.js';
import type { SessionStore, UserSession } from '../../../session/index.js';
import type { UserId, UserProfile } from '../../../users/index.js';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';

export interface ConversationSettings {
  quizPassThreshold: number;
  /** Used to build invite links; without it the bare code is shown */
  botUsername?: string;
  /** Chats told about every saved scam report */
  adminIds: readonly UserId[];
}

export interface ConversationDeps {
  sessions: SessionStore;
  content: ContentCatalog;
  gateway: MessagingGateway;
  ledger: LedgerDeps;
  referrals: GetOrCreateCodeDeps;
  analytics: TrackEventDeps;
  reports: ReportRepository;
  userLock: KeyedMutex<UserId>;
  settings: ConversationSettings;
  logger: Logger;
  /** Picks shop hints. Defaults to Math.random */
  random?: () => number;
  clock?: () => Date;
}

/**
 * Everything a handler sees for one event.
 */
export interface TurnContext {
  deps: ConversationDeps;
  user: UserProfile;
  session: UserSession;
}

export type TurnResult = Result<Turn, ConversationError>;

export const toStoreError = (error: { message: string }): StoreError =>
  createStoreError(error.message, error);

export const turn = (session: UserSession, view: ViewModel | null, notice?: string): Turn => ({
  session,
  view,
  ...(notice !== undefined && { notice }),
});

export const track = (
  ctx: TurnContext,
  type: UserEvent['type'],
  data: UserEvent['data'] = {}
): Promise<void> => trackEvent(ctx.deps.analytics, { userId: ctx.user.id, type, data });
