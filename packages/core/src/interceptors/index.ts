/**
 * Interceptor Module
 *
 * Cross-cutting behavior around the terminal query execution:
 * - Guard: authentication/authorization short-circuits
 * - Template: validated identifier substitution in query text
 * - Caching: result caching through a CacheAdapter
 * - Timeout: execution deadlines with cancellation
 * - Logging: execution logging and slow query detection
 *
 * @module interceptors
 */

// Types
export * from './types';

// Chain
export { InterceptorChain, composeInterceptors } from './interceptor-chain';

// Interceptor factories
export { createCacheInterceptor, cacheKeyFor } from './cache-interceptor';
export { createGuardInterceptor, requireContextualValue } from './guard-interceptor';
export { createLoggingInterceptor } from './logging-interceptor';
export { createTemplateInterceptor } from './template-interceptor';
export { createTimeoutInterceptor } from './timeout-interceptor';
