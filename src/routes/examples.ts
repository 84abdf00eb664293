/**
 * Example Routes
 *
 * Everyday uses of deferred work: each handler answers at once and leaves
 * the slow part (email, file processing, analytics, cache warming) to run
 * after the response.
 */

import { AppResponse, ParamReader, type Application } from '../../framework/mod.ts';
import {
  logAnalyticsEvent,
  processUploadedFile,
  sendEmailNotification,
  warmCache,
  type TaskTimings,
} from '../tasks/mod.ts';
import { createId } from './ids.ts';

export function registerExampleRoutes(app: Application, timings: TaskTimings): void {
  app.post(
    '/register',
    async (ctx) => {
      const params = new ParamReader(await ctx.req.input());
      const email = params.string('email');
      params.assertValid();

      const userId = createId('user');
      ctx.tasks.add(sendEmailNotification, ctx.logger, email, 'Welcome to our service!', timings.email);

      return new AppResponse().json({
        user_id: userId,
        email,
        status: 'registered',
        note: 'Welcome email will be sent shortly',
      });
    },
    { name: 'register', meta: { description: 'User registration with email notification' } }
  );

  app.post(
    '/upload',
    async (ctx) => {
      const params = new ParamReader(await ctx.req.input());
      const filename = params.string('filename');
      const size = params.integer('size');
      params.assertValid();

      const fileId = createId('file');
      ctx.tasks.add(processUploadedFile, ctx.logger, fileId, size, timings);

      return new AppResponse().json({
        file_id: fileId,
        filename,
        size,
        status: 'uploaded',
        note: 'File is being processed in the background',
      });
    },
    { name: 'upload', meta: { description: 'File upload with background processing' } }
  );

  app.get(
    '/product/:product_id',
    async (ctx) => {
      const params = new ParamReader({ ...(await ctx.req.input()), ...ctx.params });
      const productId = params.string('product_id');
      const userId = params.string('user_id');
      params.assertValid();

      ctx.tasks.add(
        logAnalyticsEvent,
        ctx.logger,
        'product_view',
        userId,
        { product_id: productId, timestamp: new Date().toISOString() },
        timings.analytics
      );

      return new AppResponse().json({
        product_id: productId,
        name: `Product ${productId}`,
        price: 99.99,
        in_stock: true,
      });
    },
    { name: 'product', meta: { description: 'Product view with analytics logging' } }
  );

  app.post(
    '/invalidate-cache',
    async (ctx) => {
      const params = new ParamReader(await ctx.req.input());
      const cacheKey = params.string('cache_key');
      params.assertValid();

      ctx.tasks.add(warmCache, ctx.logger, cacheKey, 'expensive_computation_result', timings.cacheWarm);

      return new AppResponse().json({
        cache_key: cacheKey,
        status: 'invalidated',
        note: 'Cache is being warmed in the background',
      });
    },
    { name: 'invalidate-cache', meta: { description: 'Cache invalidation with warming' } }
  );

  app.post(
    '/complete-order',
    async (ctx) => {
      const params = new ParamReader(await ctx.req.input());
      const orderId = params.string('order_id');
      const userEmail = params.string('user_email');
      params.assertValid();

      ctx.tasks
        .add(sendEmailNotification, ctx.logger, userEmail, `Order ${orderId} confirmed!`, timings.email)
        .add(
          logAnalyticsEvent,
          ctx.logger,
          'order_completed',
          userEmail,
          { order_id: orderId },
          timings.analytics
        )
        .add(warmCache, ctx.logger, `user-orders-${userEmail}`, 'fetch_user_order_history', timings.cacheWarm);

      return new AppResponse().json({
        order_id: orderId,
        status: 'completed',
        note: 'Email, analytics, and cache updates scheduled',
      });
    },
    { name: 'complete-order', meta: { description: 'Order completion with multiple tasks' } }
  );
}
