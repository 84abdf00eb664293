import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from '../../framework/telemetry/mod.ts';
import { DEFAULT_TIMINGS } from './timings.ts';

/**
 * Simulated call to an analytics service
 */
export async function logAnalyticsEvent(
  logger: Logger,
  eventType: string,
  userId: string,
  data: Record<string, unknown>,
  delayMs: number = DEFAULT_TIMINGS.analytics
): Promise<void> {
  logger.info(`Logging analytics: ${eventType} for user ${userId}`, { event: data });
  await sleep(delayMs);
  logger.info(`Analytics logged: ${eventType}`);
}
