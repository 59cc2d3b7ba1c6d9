/**
 * Telegram update parsing.
 *
 * Only the fields the bot reads are declared; everything else passes through.
 */

import { Type, type Static } from '@sinclair/typebox';

import type { InboundEvent } from '../../core/types.js';
import type { UserIdentity } from '../../../users/index.js';

const TelegramUserSchema = Type.Object({
  id: Type.Integer(),
  is_bot: Type.Optional(Type.Boolean()),
  username: Type.Optional(Type.String()),
  first_name: Type.Optional(Type.String()),
  last_name: Type.Optional(Type.String()),
});

const TelegramMessageSchema = Type.Object({
  message_id: Type.Integer(),
  chat: Type.Object({ id: Type.Integer() }),
  from: Type.Optional(TelegramUserSchema),
  text: Type.Optional(Type.String()),
});

const TelegramCallbackQuerySchema = Type.Object({
  id: Type.String(),
  from: TelegramUserSchema,
  data: Type.Optional(Type.String()),
  message: Type.Optional(TelegramMessageSchema),
});

export const TelegramUpdateSchema = Type.Object({
  update_id: Type.Integer(),
  message: Type.Optional(TelegramMessageSchema),
  callback_query: Type.Optional(TelegramCallbackQuerySchema),
});

export type TelegramUser = Static<typeof TelegramUserSchema>;
export type TelegramUpdate = Static<typeof TelegramUpdateSchema>;

const toIdentity = (user: TelegramUser): UserIdentity => ({
  username: user.username ?? null,
  firstName: user.first_name ?? null,
  lastName: user.last_name ?? null,
});

/**
 * Maps an update to an inbound event. Updates the bot does not handle
 * (edits, stickers, messages from bots, buttons without data) yield null.
 */
export const toInboundEvent = (update: TelegramUpdate): InboundEvent | null => {
  const query = update.callback_query;
  if (query !== undefined) {
    if (query.data === undefined || query.from.is_bot === true) {
      return null;
    }
    return {
      kind: 'button_press',
      userId: query.from.id,
      chatId: query.message?.chat.id ?? query.from.id,
      identity: toIdentity(query.from),
      data: query.data,
      callbackQueryId: query.id,
      ...(query.message !== undefined && { messageId: query.message.message_id }),
    };
  }

  const message = update.message;
  if (message?.from === undefined || message.text === undefined || message.from.is_bot === true) {
    return null;
  }
  return {
    kind: 'text_message',
    userId: message.from.id,
    chatId: message.chat.id,
    identity: toIdentity(message.from),
    body: message.text,
  };
};
