/**
 * Send Subscriber Tips Use Case
 *
 * Pushes one safety tip to every subscribed user. The tip rotates by UTC day, so
 * every subscriber gets the same tip on a given day. A failed delivery is logged
 * and counted; the run goes on with the next user.
 */

import { ok, err, type Result } from 'neverthrow';

import { DEFAULT_LANGUAGE, type ContentCatalog, type Language } from '../../../content/index.js';
import { renderScheduledTip, type MessagingGateway } from '../../../conversation/index.js';

import type { SessionStore } from '../../../session/index.js';
import type { DatabaseError, UserRepository } from '../../../users/index.js';
import type { Logger } from 'pino';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SendSubscriberTipsDeps {
  userRepo: UserRepository;
  content: ContentCatalog;
  gateway: MessagingGateway;
  /** Live sessions carry the language a user picked */
  sessions: Pick<SessionStore, 'get'>;
  logger: Logger;
}

export interface SubscriberTipsSummary {
  sent: number;
  failed: number;
}

export const pickTipOfTheDay = (tips: readonly string[], now: Date): string | undefined =>
  tips[Math.floor(now.getTime() / DAY_MS) % tips.length];

export async function sendSubscriberTips(
  deps: SendSubscriberTipsDeps,
  input: { now: Date }
): Promise<Result<SubscriberTipsSummary, DatabaseError>> {
  const log = deps.logger.child({ job: 'subscriber_tips' });

  const subscribers = await deps.userRepo.listSubscribers();
  if (subscribers.isErr()) {
    return err(subscribers.error);
  }

  let sent = 0;
  let failed = 0;

  for (const user of subscribers.value) {
    const language: Language = deps.sessions.get(user.id)?.language ?? DEFAULT_LANGUAGE;
    const tip = pickTipOfTheDay(deps.content.getTips(language), input.now);
    if (tip === undefined) {
      log.warn({ userId: user.id, language }, 'No tips available for subscriber');
      failed += 1;
      continue;
    }

    const delivered = await deps.gateway.sendView(
      { userId: user.id, chatId: user.id },
      renderScheduledTip(tip)
    );
    if (delivered.isErr()) {
      log.warn({ userId: user.id, error: delivered.error }, 'Failed to send scheduled tip');
      failed += 1;
      continue;
    }
    sent += 1;
  }

  return ok({ sent, failed });
}
