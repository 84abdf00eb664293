/**
 * Application Entry Point
 *
 * Boot sequence: configuration, logging, tracing, routes, server,
 * then signal-driven graceful shutdown.
 */

import { Application } from './framework/app.ts';
import { loadConfig } from './framework/config/mod.ts';
import { Lifecycle } from './framework/runtime/mod.ts';
import { Logger, isLogLevel, setLogger, setupTracing } from './framework/telemetry/mod.ts';
import { registerRoutes } from './src/routes/mod.ts';
import { resolveTimings } from './src/tasks/mod.ts';

async function main(): Promise<void> {
  // 1. Load configuration
  const config = await loadConfig();
  const env = config.getString('env', 'development');

  // 2. Logging
  const level = config.get('logLevel');
  const format = config.get('logFormat');
  const logger = new Logger({
    level: isLogLevel(level) ? level : env === 'production' ? 'info' : 'debug',
    format: format === 'json' || format === 'pretty' ? format : env === 'production' ? 'json' : 'pretty',
  });
  setLogger(logger);

  // 3. Tracing
  const exporter = config.getString('telemetry.exporter', 'console');
  const tracing = setupTracing({
    enabled: config.getBoolean('telemetry.enabled', false),
    serviceName: config.getString('telemetry.serviceName', 'background-tasks-demo'),
    exporter: exporter === 'none' ? 'none' : 'console',
  });

  // 4. Lifecycle; hooks run last-registered first, so tracing shuts down last
  const lifecycle = new Lifecycle({
    logger,
    shutdownTimeout: config.getNumber('tasks.drainTimeout', 15000) + 5000,
  });
  lifecycle.onShutdown(() => tracing.shutdown());
  lifecycle.handleSignals();

  // 5. Application and routes
  const app = new Application({ config, logger, lifecycle });
  registerRoutes(app, { timings: resolveTimings(config) });

  // 6. Start server
  await app.listen();
}

main().catch((error: unknown) => {
  console.error('Failed to start:', error);
  process.exit(1);
});
