/**
 * Messaging gateway over the Telegram Bot API.
 */

import { ok, err, type Result } from 'neverthrow';

import type { TelegramApiError, TelegramBotApi, ReplyMarkup } from './bot-api-client.js';
import type { GatewayError, MessagingGateway } from '../../core/ports.js';
import type { DeliveryTarget, ViewModel } from '../../core/types.js';

export interface TelegramGatewayDeps {
  client: TelegramBotApi;
}

/** Telegram refuses an edit that would not change the message */
const NOT_MODIFIED = 'message is not modified';

const toReplyMarkup = (view: ViewModel): ReplyMarkup => ({
  inline_keyboard: view.buttons.map((row) =>
    row.map((button) => ({ text: button.label, callback_data: button.data }))
  ),
});

const toGatewayError = (error: TelegramApiError): GatewayError => ({
  type: 'GatewayError',
  message: error.message,
  retryable: error.retryable,
  ...(error.statusCode !== undefined && { statusCode: error.statusCode }),
});

const toGatewayResult = (
  result: Result<void, TelegramApiError>
): Result<void, GatewayError> => (result.isErr() ? err(toGatewayError(result.error)) : ok(undefined));

export const makeTelegramGateway = (deps: TelegramGatewayDeps): MessagingGateway => {
  const { client } = deps;

  return {
    async sendView(target: DeliveryTarget, view: ViewModel) {
      return toGatewayResult(
        await client.sendMessage({
          chat_id: target.chatId,
          text: view.text,
          reply_markup: toReplyMarkup(view),
        })
      );
    },

    async editCurrentView(target: DeliveryTarget, view: ViewModel) {
      if (target.messageId === undefined) {
        const missing: GatewayError = {
          type: 'GatewayError',
          message: 'No message to edit',
          retryable: false,
        };
        return err(missing);
      }
      const result = await client.editMessageText({
        chat_id: target.chatId,
        message_id: target.messageId,
        text: view.text,
        reply_markup: toReplyMarkup(view),
      });
      if (result.isErr() && result.error.message.includes(NOT_MODIFIED)) {
        return ok(undefined);
      }
      return toGatewayResult(result);
    },

    async answerButton(target: DeliveryTarget, notice?: string) {
      if (target.callbackQueryId === undefined) {
        return ok(undefined);
      }
      return toGatewayResult(
        await client.answerCallbackQuery({
          callback_query_id: target.callbackQueryId,
          ...(notice !== undefined && { text: notice }),
        })
      );
    },
  };
};
