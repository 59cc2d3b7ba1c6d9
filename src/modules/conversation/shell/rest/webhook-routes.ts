/**
 * Telegram Webhook Routes
 *
 * Receives updates pushed by Telegram. Once the secret checks out the route
 * always answers 200. Handling failures are logged here and reported to the
 * user by the engine.
 */

import { Value } from '@sinclair/typebox/value';

import { SECRET_HEADER, verifyWebhookSecret } from './webhook-auth.js';
import { TelegramUpdateSchema, toInboundEvent } from '../telegram/update-mapper.js';

import type { ConversationEngine } from '../../core/engine.js';
import type { FastifyPluginAsync } from 'fastify';
import type { Logger } from 'pino';

export interface TelegramWebhookRoutesDeps {
  engine: ConversationEngine;
  /** When undefined the header is not checked */
  webhookSecret: string | undefined;
  logger: Logger;
}

export const TELEGRAM_WEBHOOK_PATH = '/telegram/webhook';

export const makeTelegramWebhookRoutes = (deps: TelegramWebhookRoutesDeps): FastifyPluginAsync => {
  const { engine, webhookSecret, logger } = deps;
  const log = logger.child({ routes: 'telegram-webhook' });

  return async (fastify) => {
    fastify.post(TELEGRAM_WEBHOOK_PATH, async (request, reply) => {
      if (webhookSecret !== undefined) {
        const provided = request.headers[SECRET_HEADER];
        if (typeof provided !== 'string' || !verifyWebhookSecret(provided, webhookSecret)) {
          log.warn('Webhook call with a missing or wrong secret');
          return reply.status(401).send({
            ok: false,
            error: 'UNAUTHORIZED',
            message: 'Invalid webhook secret',
          });
        }
      }

      const update = request.body;
      if (!Value.Check(TelegramUpdateSchema, update)) {
        log.warn('Ignoring malformed update');
        return reply.status(200).send({ ok: true });
      }

      const event = toInboundEvent(update);
      if (event === null) {
        log.debug({ updateId: update.update_id }, 'Ignoring unsupported update');
        return reply.status(200).send({ ok: true });
      }

      const result = await engine.handle(event);
      if (result.isErr()) {
        log.info(
          { updateId: update.update_id, userId: event.userId, error: result.error.type },
          'Update handled with failure'
        );
      }

      return reply.status(200).send({ ok: true });
    });
  };
};
