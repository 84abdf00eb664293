/**
 * Application Source
 *
 * Main application module exports.
 */

export { registerRoutes, type RegisterRoutesOptions } from './routes/mod.ts';
export * from './tasks/mod.ts';
