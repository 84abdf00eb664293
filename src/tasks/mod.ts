/**
 * Demo background tasks. Each one sleeps to stand in for real I/O and
 * logs through the logger it is given.
 */

export { backgroundSleepTask } from './sleep.ts';
export { sendEmailNotification } from './notifications.ts';
export { processUploadedFile, type FileProcessingTimings } from './files.ts';
export { logAnalyticsEvent } from './analytics.ts';
export { warmCache } from './cache.ts';
export { DEFAULT_TIMINGS, resolveTimings, type TaskTimings } from './timings.ts';
