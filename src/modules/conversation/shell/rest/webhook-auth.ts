/**
 * Webhook secret verification.
 *
 * Telegram echoes the secret configured with setWebhook in the
 * X-Telegram-Bot-Api-Secret-Token header.
 */

import { timingSafeEqual } from 'node:crypto';

export const SECRET_HEADER = 'x-telegram-bot-api-secret-token';

/**
 * Constant-time comparison of the provided and configured secrets.
 */
export function verifyWebhookSecret(provided: string, configured: string): boolean {
  const configuredBuffer = Buffer.from(configured, 'utf-8');
  const providedBuffer = Buffer.from(provided, 'utf-8');

  if (configuredBuffer.length !== providedBuffer.length) {
    timingSafeEqual(configuredBuffer, configuredBuffer);
    return false;
  }

  return timingSafeEqual(configuredBuffer, providedBuffer);
}
