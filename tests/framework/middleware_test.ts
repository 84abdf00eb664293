/**
 * Middleware Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  MiddlewarePipeline,
  conditional,
  forMethods,
  forPath,
} from '../../framework/middleware/pipeline.ts';
import { loggingMiddleware } from '../../framework/middleware/logging.ts';
import type { Context, Next } from '../../framework/http/types.ts';
import { captureLogger, createTestContext } from '../helpers.ts';

test('MiddlewarePipeline - executes single middleware', async () => {
  const pipeline = new MiddlewarePipeline();

  pipeline.use(async (_ctx: Context, next: Next) => {
    const response = await next();
    return new Response('Modified', { status: response.status });
  });

  const response = await pipeline.execute(createTestContext(), () => new Response('Original'));
  assert.equal(await response.text(), 'Modified');
});

test('MiddlewarePipeline - executes middleware in order', async () => {
  const pipeline = new MiddlewarePipeline();
  const order: number[] = [];

  pipeline.use(async (_ctx, next) => {
    order.push(1);
    const response = await next();
    order.push(5);
    return response;
  });

  pipeline.use(async (_ctx, next) => {
    order.push(2);
    const response = await next();
    order.push(4);
    return response;
  });

  await pipeline.execute(createTestContext(), () => {
    order.push(3);
    return new Response('OK');
  });

  assert.deepEqual(order, [1, 2, 3, 4, 5]);
});

test('MiddlewarePipeline - middleware can short-circuit', async () => {
  const pipeline = new MiddlewarePipeline([() => new Response('Blocked', { status: 403 })]);
  let handlerCalled = false;

  const response = await pipeline.execute(createTestContext(), () => {
    handlerCalled = true;
    return new Response('OK');
  });

  assert.equal(response.status, 403);
  assert.equal(handlerCalled, false);
});

test('MiddlewarePipeline - calling next twice throws', async () => {
  const pipeline = new MiddlewarePipeline([
    async (_ctx, next) => {
      await next();
      return await next();
    },
  ]);

  await assert.rejects(
    pipeline.execute(createTestContext(), () => new Response('OK')),
    { message: 'next() called multiple times' }
  );
});

test('MiddlewarePipeline - handler errors propagate', async () => {
  const pipeline = new MiddlewarePipeline();
  await assert.rejects(
    pipeline.execute(createTestContext(), () => {
      throw new Error('handler failed');
    }),
    { message: 'handler failed' }
  );
});

test('conditional - skips middleware when the condition is false', async () => {
  const tagged = conditional(
    (ctx) => ctx.query.has('tag'),
    () => new Response('tagged')
  );
  const pipeline = new MiddlewarePipeline([tagged]);

  const plain = await pipeline.execute(createTestContext(), () => new Response('plain'));
  const withTag = await pipeline.execute(createTestContext('http://localhost/test?tag=1'), () => new Response('plain'));

  assert.equal(await plain.text(), 'plain');
  assert.equal(await withTag.text(), 'tagged');
});

test('forPath and forMethods - scope middleware', async () => {
  const pipeline = new MiddlewarePipeline([
    forPath('/admin', () => new Response('admin only', { status: 401 })),
    forMethods(['post'], () => new Response('no posts', { status: 405 })),
  ]);
  const handler = () => new Response('ok');

  const admin = await pipeline.execute(createTestContext('http://localhost/admin/x'), handler);
  const post = await pipeline.execute(createTestContext('http://localhost/test', { method: 'POST' }), handler);
  const get = await pipeline.execute(createTestContext('http://localhost/test'), handler);

  assert.equal(admin.status, 401);
  assert.equal(post.status, 405);
  assert.equal(get.status, 200);
});

test('loggingMiddleware - logs request and response through the request logger', async () => {
  const captured = captureLogger();
  const ctx = createTestContext('http://localhost/test', {}, captured.logger);
  ctx.tasks.add(function pending() {});

  const pipeline = new MiddlewarePipeline([loggingMiddleware()]);
  await pipeline.execute(ctx, () => new Response('ok', { status: 201 }));

  assert.deepEqual(captured.messages(), ['Request received', 'Response sent']);
  assert.deepEqual(captured.entries[0]?.context, { ip: 'unknown' });

  const sent = captured.entries[1];
  assert.equal(sent?.level, 'info');
  assert.equal(sent?.context?.status, 201);
  assert.equal(sent?.context?.deferredTasks, 1);
  assert.equal(typeof sent?.context?.duration, 'number');
});

test('loggingMiddleware - warns on client errors', async () => {
  const captured = captureLogger();
  const ctx = createTestContext('http://localhost/test', {}, captured.logger);

  await new MiddlewarePipeline([loggingMiddleware({ logRequest: false })]).execute(
    ctx,
    () => new Response('nope', { status: 422 })
  );

  assert.deepEqual(captured.entries.map((e) => [e.level, e.message]), [['warn', 'Response sent']]);
});

test('loggingMiddleware - skips excluded paths', async () => {
  const captured = captureLogger();
  const ctx = createTestContext('http://localhost/health', {}, captured.logger);

  await new MiddlewarePipeline([loggingMiddleware()]).execute(ctx, () => new Response('ok'));

  assert.deepEqual(captured.entries, []);
});
