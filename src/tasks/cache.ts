import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from '../../framework/telemetry/mod.ts';
import { DEFAULT_TIMINGS } from './timings.ts';

/**
 * Simulated cache rebuild after an expensive computation
 */
export async function warmCache(
  logger: Logger,
  cacheKey: string,
  expensiveOperation: string,
  delayMs: number = DEFAULT_TIMINGS.cacheWarm
): Promise<void> {
  logger.info(`Starting cache warm for ${cacheKey}`);
  await sleep(delayMs);
  logger.info(`Cache warmed for ${cacheKey}: ${expensiveOperation}`);
}
