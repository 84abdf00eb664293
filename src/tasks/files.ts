import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from '../../framework/telemetry/mod.ts';
import { DEFAULT_TIMINGS, type TaskTimings } from './timings.ts';

export type FileProcessingTimings = Pick<TaskTimings, 'fileMetadata' | 'fileThumbnails' | 'fileDatabase'>;

/**
 * Simulated post-upload pipeline: metadata, thumbnails, database record.
 * Steps run one after another.
 */
export async function processUploadedFile(
  logger: Logger,
  fileId: string,
  fileSize: number,
  timings: FileProcessingTimings = DEFAULT_TIMINGS
): Promise<void> {
  logger.info(`Starting processing for file ${fileId} (${fileSize} bytes)`);

  await sleep(timings.fileMetadata);
  logger.info(`[${fileId}] Metadata extracted`);

  await sleep(timings.fileThumbnails);
  logger.info(`[${fileId}] Thumbnails generated`);

  await sleep(timings.fileDatabase);
  logger.info(`[${fileId}] Database updated`);

  logger.info(`[${fileId}] Processing complete`);
}
