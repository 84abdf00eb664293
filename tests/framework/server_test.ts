/**
 * Server Tests
 *
 * Runs a real HTTP server on an ephemeral port inside the test process.
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { request } from 'node:http';
import { setTimeout as sleep } from 'node:timers/promises';
import { Server } from '../../framework/http/server.ts';
import { Application } from '../../framework/app.ts';
import { AppResponse } from '../../framework/http/response.ts';
import { captureLogger, waitFor } from '../helpers.ts';

test('Server - reports the bound address for port 0', async () => {
  const server = new Server(async () => new Response('hi'), {
    port: 0,
    hostname: '127.0.0.1',
    logger: captureLogger().logger,
  });

  const address = await server.listen();
  try {
    assert.equal(address.address, '127.0.0.1');
    assert.ok(address.port > 0);
    assert.equal(server.listening, true);

    const response = await fetch(`http://127.0.0.1:${address.port}/`);
    assert.equal(await response.text(), 'hi');
  } finally {
    await server.close();
  }
  assert.equal(server.listening, false);
});

test('Server - passes method, headers and body to the listener', async () => {
  const server = new Server(
    async (request) =>
      new Response(JSON.stringify({
        method: request.method,
        path: new URL(request.url).pathname,
        custom: request.headers.get('x-custom'),
        body: await request.text(),
      })),
    { port: 0, hostname: '127.0.0.1', logger: captureLogger().logger }
  );

  const { port } = await server.listen();
  try {
    const response = await fetch(`http://127.0.0.1:${port}/echo?x=1`, {
      method: 'POST',
      headers: { 'X-Custom': 'yes' },
      body: 'payload',
    });
    assert.deepEqual(await response.json(), {
      method: 'POST',
      path: '/echo',
      custom: 'yes',
      body: 'payload',
    });
  } finally {
    await server.close();
  }
});

test('Server - runs after-response callbacks and isolates their failures', async () => {
  const captured = captureLogger();
  const calls: string[] = [];

  const server = new Server(
    async (_request, hooks) => {
      hooks.afterResponse(() => calls.push('first'));
      hooks.afterResponse(() => {
        throw new Error('callback failed');
      });
      hooks.afterResponse(() => calls.push('third'));
      calls.push('listener');
      return new Response('done');
    },
    { port: 0, hostname: '127.0.0.1', logger: captured.logger }
  );

  const { port } = await server.listen();
  try {
    const response = await fetch(`http://127.0.0.1:${port}/`);
    assert.equal(await response.text(), 'done');

    await waitFor(() => calls.length === 3);
    assert.deepEqual(calls, ['listener', 'first', 'third']);
    assert.equal(captured.find('After-response callback failed')?.error?.message, 'callback failed');
  } finally {
    await server.close();
  }
});

test('Server - listener errors become a plain 500', async () => {
  const captured = captureLogger();
  const server = new Server(
    async () => {
      throw new Error('listener exploded');
    },
    { port: 0, hostname: '127.0.0.1', logger: captured.logger }
  );

  const { port } = await server.listen();
  try {
    const response = await fetch(`http://127.0.0.1:${port}/x`);
    assert.equal(response.status, 500);
    assert.equal(await response.text(), 'Internal Server Error');
    assert.equal(captured.find('Request error')?.error?.message, 'listener exploded');
  } finally {
    await server.close();
  }
});

test('Server.listen - rejects when already listening', async () => {
  const server = new Server(async () => new Response('x'), {
    port: 0,
    hostname: '127.0.0.1',
    logger: captureLogger().logger,
  });
  await server.listen();
  try {
    await assert.rejects(server.listen(), { message: 'Server is already listening' });
  } finally {
    await server.close();
  }
});

test('Application.listen - client gets the response before the deferred task finishes', async () => {
  const captured = captureLogger();
  const app = new Application({ logger: captured.logger });
  let taskFinishedAt = 0;

  app.get('/test', (ctx) => {
    ctx.tasks.add(async function slowTask() {
      await sleep(300);
      taskFinishedAt = Date.now();
    });
    return new AppResponse().text('ok');
  });

  const { port } = await app.listen({ port: 0, hostname: '127.0.0.1' });
  try {
    const response = await fetch(`http://127.0.0.1:${port}/test`);
    const body = await response.text();
    const respondedAt = Date.now();

    assert.equal(body, 'ok');
    assert.equal(taskFinishedAt, 0);

    await waitFor(() => taskFinishedAt > 0);
    assert.ok(taskFinishedAt >= respondedAt);
  } finally {
    await app.stop();
  }
});

test('Application.stop - closes the server and drains tasks', async () => {
  const captured = captureLogger();
  const app = new Application({ logger: captured.logger });
  let finished = false;

  app.get('/job', (ctx) => {
    ctx.tasks.add(async () => {
      await sleep(50);
      finished = true;
    });
    return new AppResponse().text('queued');
  });

  const { port } = await app.listen({ port: 0, hostname: '127.0.0.1' });
  const response = await fetch(`http://127.0.0.1:${port}/job`);
  assert.equal(await response.text(), 'queued');
  await waitFor(() => app.getRunner().stats().dispatched === 1);

  await app.stop();

  assert.equal(finished, true);
  assert.ok(captured.find('Server closed'));
  await assert.rejects(fetch(`http://127.0.0.1:${port}/job`));
});

test('Application.listen - deferred tasks still run when the client disconnects mid-handler', async () => {
  const captured = captureLogger();
  const app = new Application({ logger: captured.logger });
  const ran: string[] = [];
  let entered = false;

  app.get('/slow', async (ctx) => {
    entered = true;
    ctx.tasks.add(function mustRun() {
      ran.push('mustRun');
    });
    await sleep(150);
    return new AppResponse().text('late');
  });

  const { port } = await app.listen({ port: 0, hostname: '127.0.0.1' });
  try {
    const clientErrors: Error[] = [];
    const req = request({ host: '127.0.0.1', port, path: '/slow' });
    req.on('error', (error) => clientErrors.push(error));
    req.end();

    await waitFor(() => entered);
    req.destroy();

    await waitFor(() => ran.length === 1);
    await app.getRunner().drain();

    assert.deepEqual(ran, ['mustRun']);
    assert.deepEqual(app.getRunner().stats(), { dispatched: 1, completed: 1, failed: 0, pending: 0 });
    assert.equal(captured.entries.filter((entry) => entry.message === 'Deferred task completed').length, 1);
  } finally {
    await app.stop();
  }
});
