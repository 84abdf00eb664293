/**
 * Layer 2: Middleware Layer
 *
 * Cross-cutting concerns that wrap every request/response cycle.
 * Implements the onion model where each middleware wraps the next.
 *
 * Responsibilities:
 * - Handle cross-cutting concerns without polluting business logic
 * - Enable composition of features
 * - Maintain separation of concerns
 */

export { MiddlewarePipeline, conditional, forPath, forMethods } from './pipeline.ts';
export { loggingMiddleware, type LoggingOptions } from './logging.ts';
