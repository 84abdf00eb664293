/**
 * Demo Routes
 *
 * The minimal case: one endpoint that defers a long sleep, plus an index
 * of every described route.
 */

import { AppResponse, type Application, type RouteDefinition } from '../../framework/mod.ts';
import { backgroundSleepTask, type TaskTimings } from '../tasks/mod.ts';
import { createId } from './ids.ts';

export function registerDemoRoutes(app: Application, timings: TaskTimings): void {
  app.get(
    '/test',
    (ctx) => {
      const taskId = createId('task');

      ctx.tasks.add(backgroundSleepTask, ctx.logger, taskId, timings.sleep);

      ctx.logger.info(`[${taskId}] Endpoint returning immediately`);
      return new AppResponse().text('ok');
    },
    { name: 'test', meta: { description: `Creates a background task that sleeps for ${timings.sleep / 1000} seconds` } }
  );

  app.get(
    '/',
    () => {
      return new AppResponse().json({
        message: 'Background Tasks Demo',
        endpoints: describeRoutes(app.getRoutes()),
        note: 'All endpoints return immediately while tasks run in background',
      });
    },
    { name: 'index', meta: { description: 'This index of endpoints' } }
  );
}

/**
 * Map "<METHOD> <path>" to the description of every route that has one
 */
export function describeRoutes(routes: RouteDefinition[]): Record<string, string> {
  const endpoints: Record<string, string> = {};
  for (const route of routes) {
    const description = route.meta?.description;
    if (!description) continue;

    const method = Array.isArray(route.method) ? route.method.join('|') : route.method;
    endpoints[`${method} ${route.path}`] = description;
  }
  return endpoints;
}
