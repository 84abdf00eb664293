/**
 * Deferred Task Layer
 *
 * Run secondary work after the response is sent.
 *
 * Responsibilities:
 * - Collect work per request without executing it
 * - Dispatch it once the response is out, never blocking the response
 * - Isolate failures: a failing task is logged and its siblings still run
 * - Let shutdown wait for tasks that are still running
 */

export { DeferredTasks, TaskStateError, type DeferredTask } from './deferred.ts';
export {
  TaskRunner,
  type TaskRunnerOptions,
  type DispatchMeta,
  type TaskRunnerStats,
} from './runner.ts';
