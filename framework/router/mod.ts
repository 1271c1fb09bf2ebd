/**
 * Routing Layer
 *
 * Maps incoming request URLs to handlers, extracts path parameters and
 * reverses named routes back into URLs.
 */

export { Router, type RouteDefinition, type RouteMatch, type RouteOptions } from './router.ts';
export { buildUrl, parsePathParams, type PatternParams } from './patterns.ts';
