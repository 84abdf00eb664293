/**
 * Layer 3: Routing Layer
 *
 * Maps incoming request URLs to application code.
 *
 * Responsibilities:
 * - Map URLs to handlers
 * - Extract path parameters
 * - Support URL generation for named routes
 * - Carry route metadata for introspection
 */

export {
  Router,
  type RouteDefinition,
  type RouteMatch,
  type RouteMeta,
  type RouteOptions,
} from './router.ts';
