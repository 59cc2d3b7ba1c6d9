/**
 * View delivery with edit-then-send fallback.
 */

import { ok, err, type Result } from 'neverthrow';

import type { GatewayError, MessagingGateway } from './ports.js';
import type { DeliveryTarget, ViewModel } from './types.js';
import type { Logger } from 'pino';

/**
 * Edits the message behind the pressed button when there is one; falls back to a
 * new message when the edit is refused (message too old, deleted, not text).
 */
export async function deliverView(
  gateway: MessagingGateway,
  target: DeliveryTarget,
  view: ViewModel,
  logger: Logger
): Promise<Result<void, GatewayError>> {
  if (target.messageId !== undefined) {
    const edited = await gateway.editCurrentView(target, view);
    if (edited.isOk()) {
      return ok(undefined);
    }
    logger.debug(
      { userId: target.userId, messageId: target.messageId, message: edited.error.message },
      'Edit refused, sending a new message'
    );
  }

  const sent = await gateway.sendView(target, view);
  if (sent.isErr()) {
    return err(sent.error);
  }
  return ok(undefined);
}
