/**
 * Task Runner
 *
 * Executes deferred tasks once the response that registered them is out.
 * Each task is scheduled on its own with setImmediate, in registration
 * order, so a slow or failing task never holds up a sibling. Outcomes are
 * only visible through logs and spans: the caller already has its response.
 */

import { getLogger, type Logger } from '../telemetry/logger.ts';
import { withSpan, SpanKind, type Context as TraceContext } from '../telemetry/otel.ts';
import { DeferredTasks, type DeferredTask } from './deferred.ts';

export interface TaskRunnerOptions {
  logger?: Logger;
}

/**
 * Where a batch of tasks came from
 */
export interface DispatchMeta {
  requestId?: string;
  /** Request logger; task log lines inherit its context */
  logger?: Logger;
  /** Trace context of the originating request */
  parentContext?: TraceContext;
}

export interface TaskRunnerStats {
  dispatched: number;
  completed: number;
  failed: number;
  pending: number;
}

function nextMacrotask(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function elapsed(start: number): number {
  return Math.round((performance.now() - start) * 100) / 100;
}

/**
 * Fire-and-forget executor for deferred tasks
 */
export class TaskRunner {
  private logger: Logger;
  private inflight = new Set<Promise<void>>();
  private counts = { dispatched: 0, completed: 0, failed: 0 };

  constructor(options: TaskRunnerOptions = {}) {
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Take a request's tasks and schedule each one. Returns immediately with
   * the number of tasks scheduled.
   */
  dispatch(tasks: DeferredTasks | DeferredTask[], meta: DispatchMeta = {}): number {
    const list = tasks instanceof DeferredTasks ? tasks.take() : tasks;
    if (list.length === 0) return 0;

    const logger = meta.logger ?? this.logger;
    logger.debug('Dispatching deferred tasks', {
      count: list.length,
      tasks: list.map((task) => task.name),
    });

    for (const task of list) {
      this.schedule(task, logger, meta);
    }

    return list.length;
  }

  /**
   * Number of dispatched tasks that have not settled
   */
  get pending(): number {
    return this.inflight.size;
  }

  /**
   * Counters since the runner was created
   */
  stats(): TaskRunnerStats {
    return { ...this.counts, pending: this.inflight.size };
  }

  /**
   * Wait for in-flight tasks to settle. Resolves false if the timeout
   * elapses first; tasks are never cancelled.
   */
  async drain(timeoutMs?: number): Promise<boolean> {
    const settle = async (): Promise<boolean> => {
      while (this.inflight.size > 0) {
        await Promise.allSettled([...this.inflight]);
      }
      return true;
    };

    if (timeoutMs === undefined) {
      return await settle();
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([settle(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private schedule(task: DeferredTask, logger: Logger, meta: DispatchMeta): void {
    this.counts.dispatched++;

    const execution = nextMacrotask().then(() => this.execute(task, logger, meta));
    this.inflight.add(execution);

    void execution
      .catch((error: unknown) => {
        this.logger.error('Task runner failure', error, { task: task.name });
      })
      .finally(() => {
        this.inflight.delete(execution);
      });
  }

  private async execute(task: DeferredTask, logger: Logger, meta: DispatchMeta): Promise<void> {
    const taskLogger = logger.child({ task: task.name, taskIndex: task.index });
    const start = performance.now();

    taskLogger.debug('Deferred task started');

    try {
      await withSpan(
        `task ${task.name}`,
        async () => {
          await task.run();
        },
        {
          kind: SpanKind.INTERNAL,
          parentContext: meta.parentContext,
          attributes: {
            'task.name': task.name,
            'task.index': task.index,
            'request.id': meta.requestId,
          },
        },
      );

      this.counts.completed++;
      taskLogger.info('Deferred task completed', { durationMs: elapsed(start) });
    } catch (error) {
      this.counts.failed++;
      taskLogger.error('Deferred task failed', error, { durationMs: elapsed(start) });
    }
  }
}
