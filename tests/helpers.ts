/**
 * Shared test helpers
 */

import { setImmediate as nextMacrotask } from 'node:timers/promises';
import { Logger, type LogEntry, type LogLevel } from '../framework/telemetry/logger.ts';
import { AppRequest } from '../framework/http/request.ts';
import { DeferredTasks } from '../framework/tasks/deferred.ts';
import type { Context } from '../framework/http/types.ts';
import type { Application } from '../framework/app.ts';

export interface CapturedLogger {
  logger: Logger;
  entries: LogEntry[];
  messages(): string[];
  find(message: string): LogEntry | undefined;
}

/**
 * Logger that records entries instead of printing them
 */
export function captureLogger(level: LogLevel = 'debug'): CapturedLogger {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level, output: (entry) => entries.push(entry) });
  return {
    logger,
    entries,
    messages: () => entries.map((entry) => entry.message),
    find: (message) => entries.find((entry) => entry.message === message),
  };
}

export function createTestContext(
  url = 'http://localhost/test',
  init: RequestInit = {},
  logger: Logger = captureLogger().logger
): Context {
  const request = new Request(url, init);
  const req = new AppRequest(request);
  const parsed = new URL(url);
  return {
    request,
    req,
    url: parsed,
    params: {},
    query: parsed.searchParams,
    state: req.state,
    header: (name: string) => request.headers.get(name),
    method: request.method,
    requestId: 'test-request',
    logger,
    tasks: new DeferredTasks(),
  };
}

/**
 * Let after-response dispatch happen, then wait for every deferred task
 */
export async function settle(app: Application): Promise<void> {
  await nextMacrotask();
  await app.getRunner().drain();
}

/**
 * Poll until the predicate holds
 */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

/**
 * Parse a response body that must be a JSON object
 */
export async function readJson(response: Response): Promise<Record<string, unknown>> {
  const body: unknown = await response.json();
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new Error(`Expected a JSON object, got ${JSON.stringify(body)}`);
  }
  return Object.fromEntries(Object.entries(body));
}
