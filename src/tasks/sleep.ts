import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from '../../framework/telemetry/mod.ts';
import { DEFAULT_TIMINGS } from './timings.ts';

/**
 * Long-running stand-in task: sleeps, then reports how long it took.
 */
export async function backgroundSleepTask(
  logger: Logger,
  taskId: string,
  delayMs: number = DEFAULT_TIMINGS.sleep
): Promise<void> {
  const startedAt = new Date();
  logger.info(`[${taskId}] Background task started`, { startedAt: startedAt.toISOString() });

  await sleep(delayMs);

  const endedAt = new Date();
  logger.info(`[${taskId}] Background task completed`, {
    endedAt: endedAt.toISOString(),
    durationSeconds: (endedAt.getTime() - startedAt.getTime()) / 1000,
  });
}
