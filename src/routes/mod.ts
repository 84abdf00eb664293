/**
 * Application Routes
 */

import { loggingMiddleware, type Application } from '../../framework/mod.ts';
import { DEFAULT_TIMINGS, type TaskTimings } from '../tasks/mod.ts';
import { registerDemoRoutes } from './demo.ts';
import { registerExampleRoutes } from './examples.ts';

export interface RegisterRoutesOptions {
  timings?: TaskTimings;
  /** Log every request and response through the request logger */
  requestLogging?: boolean;
}

/**
 * Register all application routes
 */
export function registerRoutes(app: Application, options: RegisterRoutesOptions = {}): void {
  const timings = options.timings ?? DEFAULT_TIMINGS;

  if (options.requestLogging ?? true) {
    app.use(loggingMiddleware());
  }

  registerDemoRoutes(app, timings);
  registerExampleRoutes(app, timings);
}
