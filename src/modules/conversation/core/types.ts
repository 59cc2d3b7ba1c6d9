/**
 * Conversation Module - Core Types
 */

import type { ViewId } from '../../navigation/index.js';
import type { UserSession } from '../../session/index.js';
import type { UserId, UserIdentity } from '../../users/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Inbound events
// ─────────────────────────────────────────────────────────────────────────────

interface InboundEventBase {
  userId: UserId;
  chatId: number;
  identity: UserIdentity;
}

export interface ButtonPressEvent extends InboundEventBase {
  kind: 'button_press';
  data: string;
  callbackQueryId?: string;
  /** Message carrying the pressed button */
  messageId?: number;
}

export interface TextMessageEvent extends InboundEventBase {
  kind: 'text_message';
  body: string;
}

/**
 * Transport-neutral event, decided once at the boundary.
 */
export type InboundEvent = ButtonPressEvent | TextMessageEvent;

/**
 * Where a reply goes: the user plus the transport handles of the inbound event.
 */
export interface DeliveryTarget {
  userId: UserId;
  chatId: number;
  messageId?: number;
  callbackQueryId?: string;
}

export const toDeliveryTarget = (event: InboundEvent): DeliveryTarget => ({
  userId: event.userId,
  chatId: event.chatId,
  ...(event.kind === 'button_press' &&
    event.messageId !== undefined && { messageId: event.messageId }),
  ...(event.kind === 'button_press' &&
    event.callbackQueryId !== undefined && { callbackQueryId: event.callbackQueryId }),
});

// ─────────────────────────────────────────────────────────────────────────────
// Views
// ─────────────────────────────────────────────────────────────────────────────

export interface Button {
  label: string;
  /** Encoded action, see actions.ts */
  data: string;
}

/**
 * Rendered text plus rows of buttons.
 */
export interface ViewModel {
  text: string;
  buttons: Button[][];
}

// ─────────────────────────────────────────────────────────────────────────────
// Turn results
// ─────────────────────────────────────────────────────────────────────────────

/**
 * What a handler decided: the session to keep, an optional view to render and
 * an optional ephemeral notice.
 */
export interface Turn {
  session: UserSession;
  view: ViewModel | null;
  notice?: string;
}

export interface HandledEvent {
  /** Action type or command name that was handled */
  handledAs: string;
  /** Top of the navigation stack after the event */
  currentView: ViewId;
}
