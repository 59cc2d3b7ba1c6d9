/**
 * Telegram Bot API Client
 *
 * Thin JSON-over-HTTPS client for the handful of Bot API methods the bot uses.
 * No retries; a failed call is reported as a classified error.
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ok, err, type Result } from 'neverthrow';

import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface TelegramClientConfig {
  botToken: string;
  /** e.g. https://api.telegram.org */
  apiBaseUrl: string;
  logger: Logger;
  /** Per-request timeout. Default: 10000 */
  timeoutMs?: number;
  /** Fetch override for tests */
  fetchFn?: typeof fetch;
}

export interface TelegramApiError {
  type: 'RATE_LIMITED' | 'REJECTED' | 'SERVER' | 'NETWORK' | 'UNKNOWN';
  message: string;
  retryable: boolean;
  statusCode?: number;
}

export interface InlineKeyboardButton {
  text: string;
  callback_data: string;
}

export interface ReplyMarkup {
  inline_keyboard: InlineKeyboardButton[][];
}

export interface SendMessageParams {
  chat_id: number;
  text: string;
  reply_markup?: ReplyMarkup;
}

export interface EditMessageTextParams extends SendMessageParams {
  message_id: number;
}

export interface AnswerCallbackQueryParams {
  callback_query_id: string;
  text?: string;
}

export interface TelegramBotApi {
  sendMessage(params: SendMessageParams): Promise<Result<void, TelegramApiError>>;
  editMessageText(params: EditMessageTextParams): Promise<Result<void, TelegramApiError>>;
  answerCallbackQuery(params: AnswerCallbackQueryParams): Promise<Result<void, TelegramApiError>>;
}

const ApiResponseSchema = Type.Object({
  ok: Type.Boolean(),
  description: Type.Optional(Type.String()),
  error_code: Type.Optional(Type.Integer()),
});

type ApiResponse = Static<typeof ApiResponseSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const makeTelegramClient = (config: TelegramClientConfig): TelegramBotApi => {
  const { botToken, apiBaseUrl, logger, timeoutMs = 10000, fetchFn = fetch } = config;
  const log = logger.child({ component: 'TelegramClient' });
  const baseUrl = `${apiBaseUrl.replace(/\/+$/, '')}/bot${botToken}`;

  const call = async (method: string, payload: object): Promise<Result<void, TelegramApiError>> => {
    let response: Response;
    try {
      response = await fetchFn(`${baseUrl}/${method}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      log.warn({ err: error, method }, 'Telegram request failed');
      return err(mapCaughtError(error));
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      log.warn({ err: error, method, status: response.status }, 'Telegram returned a non-JSON body');
      const unreadable: TelegramApiError = {
        type: response.status >= 500 ? 'SERVER' : 'UNKNOWN',
        message: `Unreadable response (HTTP ${String(response.status)})`,
        retryable: response.status >= 500,
        statusCode: response.status,
      };
      return err(unreadable);
    }

    if (!Value.Check(ApiResponseSchema, body)) {
      const malformed: TelegramApiError = {
        type: 'UNKNOWN',
        message: 'Unexpected response shape',
        retryable: false,
        statusCode: response.status,
      };
      return err(malformed);
    }

    if (!body.ok) {
      log.debug(
        { method, status: response.status, description: body.description },
        'Telegram refused call'
      );
      return err(mapApiError(response.status, body));
    }

    return ok(undefined);
  };

  return {
    sendMessage: (params) => call('sendMessage', params),
    editMessageText: (params) => call('editMessageText', params),
    answerCallbackQuery: (params) => call('answerCallbackQuery', params),
  };
};

/**
 * Maps a Bot API refusal to a classified error.
 */
function mapApiError(status: number, body: ApiResponse): TelegramApiError {
  const statusCode = body.error_code ?? status;
  const message = body.description ?? `Telegram error ${String(statusCode)}`;

  if (statusCode === 429) {
    return { type: 'RATE_LIMITED', message, retryable: true, statusCode };
  }
  if (statusCode >= 400 && statusCode < 500) {
    return { type: 'REJECTED', message, retryable: false, statusCode };
  }
  if (statusCode >= 500) {
    return { type: 'SERVER', message, retryable: true, statusCode };
  }
  return { type: 'UNKNOWN', message, retryable: false, statusCode };
}

/**
 * Maps thrown fetch errors (network, timeout) to a classified error.
 */
function mapCaughtError(error: unknown): TelegramApiError {
  if (error instanceof Error) {
    return { type: 'NETWORK', message: error.message, retryable: true };
  }
  return { type: 'UNKNOWN', message: 'Unknown error occurred', retryable: false };
}
