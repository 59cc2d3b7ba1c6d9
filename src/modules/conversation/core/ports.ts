/**
 * Conversation Module - Ports
 */

import type { DeliveryTarget, ViewModel } from './types.js';
import type { Result } from 'neverthrow';

export interface GatewayError {
  readonly type: 'GatewayError';
  readonly message: string;
  readonly retryable: boolean;
  readonly statusCode?: number;
}

/**
 * Outbound side of the messaging transport.
 */
export interface MessagingGateway {
  sendView(target: DeliveryTarget, view: ViewModel): Promise<Result<void, GatewayError>>;

  /** Replaces the message that carried the pressed button */
  editCurrentView(target: DeliveryTarget, view: ViewModel): Promise<Result<void, GatewayError>>;

  /** Acknowledges a button press, optionally with an ephemeral notice */
  answerButton(target: DeliveryTarget, notice?: string): Promise<Result<void, GatewayError>>;
}
