/**
 * Deferred Tasks
 *
 * The per-request list of work to run after the response is sent.
 * A handler appends to it through `ctx.tasks.add(fn, ...args)`; the
 * application takes the list once the response has been produced and
 * hands it to the TaskRunner.
 */

/**
 * A unit of work bound to its arguments
 */
export interface DeferredTask {
  /** Name used in logs and span names */
  readonly name: string;
  /** Position in the request's registration order */
  readonly index: number;
  /** Invoke the callable with the arguments it was registered with */
  run(): unknown;
}

/**
 * Raised when work is registered on a list the runtime already took
 */
export class TaskStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TaskStateError';
  }
}

/**
 * Ordered, append-only list of deferred tasks for one request
 */
export class DeferredTasks {
  private tasks: DeferredTask[] = [];
  private taken = false;

  /**
   * Register a callable and its arguments.
   * Nothing runs here; the arguments are type-checked against the callable.
   */
  add<A extends unknown[]>(fn: (...args: A) => unknown, ...args: A): this {
    return this.addNamed(fn.name || 'anonymous', fn, ...args);
  }

  /**
   * Register a callable under an explicit name
   */
  addNamed<A extends unknown[]>(name: string, fn: (...args: A) => unknown, ...args: A): this {
    if (this.taken) {
      throw new TaskStateError(`Cannot register "${name}": deferred tasks were already dispatched`);
    }

    this.tasks.push({
      name,
      index: this.tasks.length,
      run: () => fn(...args),
    });
    return this;
  }

  /**
   * Number of registered tasks
   */
  get size(): number {
    return this.tasks.length;
  }

  /**
   * Whether the runtime has taken the list
   */
  get dispatched(): boolean {
    return this.taken;
  }

  /**
   * Names in registration order
   */
  names(): string[] {
    return this.tasks.map((task) => task.name);
  }

  /**
   * Hand the list over to the runtime. Later registrations throw.
   */
  take(): DeferredTask[] {
    if (this.taken) {
      throw new TaskStateError('Deferred tasks were already taken');
    }
    this.taken = true;

    const tasks = this.tasks;
    this.tasks = [];
    return tasks;
  }
}
