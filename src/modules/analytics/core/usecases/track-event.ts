/**
 * Track Event Use Case
 *
 * Best effort: a failed write is logged and never fails the user action.
 */

import type { AnalyticsRepository } from '../ports.js';
import type { UserEvent } from '../types.js';
import type { Logger } from 'pino';

export interface TrackEventDeps {
  analyticsRepo: AnalyticsRepository;
  logger: Logger;
}

export async function trackEvent(deps: TrackEventDeps, event: UserEvent): Promise<void> {
  const result = await deps.analyticsRepo.recordEvent(event);
  if (result.isErr()) {
    deps.logger.warn(
      { userId: event.userId, eventType: event.type, message: result.error.message },
      'Failed to record analytics event'
    );
  }
}
