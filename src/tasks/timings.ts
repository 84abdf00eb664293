/**
 * Simulated I/O delays for the demo task stubs, in milliseconds.
 * Overridable through `demo.timings` in configuration.
 */

import type { Config } from '../../framework/config/mod.ts';

export interface TaskTimings {
  sleep: number;
  email: number;
  fileMetadata: number;
  fileThumbnails: number;
  fileDatabase: number;
  analytics: number;
  cacheWarm: number;
}

export const DEFAULT_TIMINGS: TaskTimings = {
  sleep: 10_000,
  email: 2_000,
  fileMetadata: 1_000,
  fileThumbnails: 2_000,
  fileDatabase: 1_000,
  analytics: 500,
  cacheWarm: 3_000,
};

/**
 * Read timings from `demo.timings.*`, keeping defaults for anything unset
 */
export function resolveTimings(config: Config): TaskTimings {
  const timings = { ...DEFAULT_TIMINGS };
  for (const key of Object.keys(DEFAULT_TIMINGS)) {
    if (isTimingKey(key)) {
      timings[key] = config.getNumber(`demo.timings.${key}`, DEFAULT_TIMINGS[key]);
    }
  }
  return timings;
}

function isTimingKey(key: string): key is keyof TaskTimings {
  return Object.hasOwn(DEFAULT_TIMINGS, key);
}
