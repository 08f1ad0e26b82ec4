export { pipeline } from './pipeline.js';
export type { Handler, HandlerContext, Middleware } from './pipeline.js';
export { errorHandler, createErrorHandler } from './error-handler.js';
export { createAuthMiddleware } from './authenticate.js';
export { validateBody } from './validate-body.js';
export { bodyLimit } from './body-limit.js';
export { createRateLimitMiddleware, RATE_LIMITS } from './rate-limit.js';
export type { RateLimitConfig } from './rate-limit.js';
export { createLoggingMiddleware } from './logging.js';
