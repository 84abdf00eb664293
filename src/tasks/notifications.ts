import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from '../../framework/telemetry/mod.ts';
import { DEFAULT_TIMINGS } from './timings.ts';

/**
 * Simulated email delivery
 */
export async function sendEmailNotification(
  logger: Logger,
  userEmail: string,
  message: string,
  delayMs: number = DEFAULT_TIMINGS.email
): Promise<void> {
  logger.info(`Starting email send to ${userEmail}`);
  await sleep(delayMs);
  logger.info(`Email sent to ${userEmail}: ${message}`);
}
