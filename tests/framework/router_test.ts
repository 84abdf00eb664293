/**
 * Router Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { Router } from '../../framework/router/router.ts';
import { ValidationError } from '../../framework/http/validation.ts';

const ok = () => new Response('ok');

test('Router - matches a static GET route', () => {
  const router = new Router();
  router.get('/test', ok);

  const match = router.match('GET', '/test');
  assert.equal(match?.route.path, '/test');
  assert.deepEqual(match?.params, {});
});

test('Router - requires the method to match', () => {
  const router = new Router();
  router.post('/register', ok);

  assert.equal(router.match('GET', '/register'), null);
  assert.ok(router.match('POST', '/register'));
});

test('Router - extracts path parameters', () => {
  const router = new Router();
  router.get('/product/:product_id', ok);

  const match = router.match('GET', '/product/42');
  assert.deepEqual(match?.params, { product_id: '42' });
});

test('Router - percent-decodes path parameters', () => {
  const router = new Router();
  router.get('/product/:product_id', ok);

  assert.deepEqual(router.match('GET', '/product/a%20b')?.params, { product_id: 'a b' });
  assert.deepEqual(router.match('GET', '/product/caf%C3%A9')?.params, { product_id: 'café' });
});

test('Router - malformed escapes raise a ValidationError naming the parameter', () => {
  const router = new Router();
  router.get('/product/:product_id', ok);

  assert.throws(
    () => router.match('GET', '/product/%E0%A4'),
    (error: unknown) => {
      if (!(error instanceof ValidationError)) return false;
      assert.deepEqual(error.fields, { product_id: ['Malformed percent-encoding'] });
      return true;
    }
  );
});

test('Router - ignores the query string', () => {
  const router = new Router();
  router.get('/product/:product_id', ok);

  assert.deepEqual(router.match('GET', '/product/7?user_id=u1')?.params, { product_id: '7' });
});

test('Router - first registered route wins', () => {
  const router = new Router();
  const first = () => new Response('first');
  const second = () => new Response('second');
  router.get('/items/:id', first);
  router.get('/items/special', second);

  assert.equal(router.match('GET', '/items/special')?.handler, first);
});

test('Router - returns null when nothing matches', () => {
  const router = new Router();
  router.get('/test', ok);
  assert.equal(router.match('GET', '/missing'), null);
});

test('Router.all - matches any method', () => {
  const router = new Router();
  router.all('/any', ok);
  assert.ok(router.match('DELETE', '/any'));
  assert.ok(router.match('GET', '/any'));
});

test('Router.addRoute - accepts a list of methods', () => {
  const router = new Router();
  router.addRoute(['PUT', 'PATCH'], '/items/:id', ok);
  assert.ok(router.match('PATCH', '/items/1'));
  assert.equal(router.match('GET', '/items/1'), null);
});

test('Router - applies the prefix', () => {
  const router = new Router('/api');
  router.get('/status', ok);
  assert.ok(router.match('GET', '/api/status'));
  assert.equal(router.match('GET', '/status'), null);
});

test('Router.url - builds the path of a named route', () => {
  const router = new Router();
  router.get('/product/:product_id', ok, { name: 'product' });

  assert.equal(router.url('product', { product_id: 'a b' }), '/product/a%20b');
  assert.equal(router.url('unknown'), null);
});

test('Router.getRoutes - lists routes with their metadata in order', () => {
  const router = new Router();
  router.get('/', ok, { meta: { description: 'Index' } });
  router.post('/upload', ok);

  const routes = router.getRoutes();
  assert.deepEqual(
    routes.map((r) => [r.method, r.path, r.meta?.description]),
    [
      ['GET', '/', 'Index'],
      ['POST', '/upload', undefined],
    ]
  );
});
