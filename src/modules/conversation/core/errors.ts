/**
 * Conversation Module - Domain Errors
 */

export interface InvalidSelectionError {
  readonly type: 'InvalidSelectionError';
  readonly message: string;
  /** Raw button data or command that was rejected */
  readonly input: string;
}

export interface StoreError {
  readonly type: 'StoreError';
  readonly message: string;
  readonly cause?: unknown;
}

export interface DeliveryError {
  readonly type: 'DeliveryError';
  readonly message: string;
  readonly cause?: unknown;
}

export type ConversationError = InvalidSelectionError | StoreError | DeliveryError;

export const createInvalidSelectionError = (
  input: string,
  reason: string
): InvalidSelectionError => ({
  type: 'InvalidSelectionError',
  message: `Invalid selection "${input}": ${reason}`,
  input,
});

export const createStoreError = (message: string, cause?: unknown): StoreError => ({
  type: 'StoreError',
  message,
  cause,
});

export const createDeliveryError = (message: string, cause?: unknown): DeliveryError => ({
  type: 'DeliveryError',
  message,
  cause,
});

/**
 * Text shown to the user for each failure class.
 */
export const USER_NOTICE_FOR_ERROR: Record<ConversationError['type'], string> = {
  InvalidSelectionError: 'Invalid selection. Please use the buttons of the latest message.',
  StoreError: 'Something went wrong on our side. Please try again later.',
  DeliveryError: 'Something went wrong on our side. Please try again later.',
};
