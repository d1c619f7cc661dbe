export { Router, DEFAULT_ROUTER_CONFIG, type RouterDependencies, type RouterOptions } from './router.js';
export { DEFAULT_SESSION_CACHE_SIZE, RoutingSessionCache } from './session-cache.js';
export { RoutingSession, type SessionDependencies, type SessionState } from './routing-session.js';
export type { RouteDecision, RouteOptions, RouteRequest, RouterConfig } from './types.js';
