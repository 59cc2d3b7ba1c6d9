/**
 * Conversation Module - Public API
 */

export type {
  InboundEvent,
  ButtonPressEvent,
  TextMessageEvent,
  DeliveryTarget,
  Button,
  ViewModel,
  Turn,
  HandledEvent,
} from './core/types.js';
export { toDeliveryTarget } from './core/types.js';

export type {
  ConversationError,
  InvalidSelectionError,
  StoreError,
  DeliveryError,
} from './core/errors.js';
export { USER_NOTICE_FOR_ERROR } from './core/errors.js';

export type { MessagingGateway, GatewayError } from './core/ports.js';

export { encodeAction, parseAction, OPENABLE_VIEWS, type Action } from './core/actions.js';
export { parseCommand, type Command } from './core/commands.js';
export { checkLink, extractUrls, type LinkVerdict, type LinkFlag } from './core/link-check.js';
export { deliverView } from './core/delivery.js';
export { renderScheduledTip } from './core/views.js';

export type { ConversationDeps, ConversationSettings } from './core/handlers/context.js';
export { createConversationEngine, type ConversationEngine } from './core/engine.js';

export {
  makeTelegramClient,
  type TelegramBotApi,
  type TelegramApiError,
  type TelegramClientConfig,
} from './shell/telegram/bot-api-client.js';
export { makeTelegramGateway } from './shell/telegram/gateway.js';
export {
  toInboundEvent,
  TelegramUpdateSchema,
  type TelegramUpdate,
} from './shell/telegram/update-mapper.js';
export {
  makeTelegramWebhookRoutes,
  TELEGRAM_WEBHOOK_PATH,
  type TelegramWebhookRoutesDeps,
} from './shell/rest/webhook-routes.js';
