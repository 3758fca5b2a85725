export { RequestRegistry } from './requests.js';
export type { NewAuthorizationRequest, RequestListener, RequestRegistryOptions } from './requests.js';
export { SessionStore } from './sessions.js';
export type { SessionStoreOptions } from './sessions.js';
export { RateLimiter, backoffDelaySeconds } from './rate-limiter.js';
export type { RateLimitRecord, RateLimiterOptions } from './rate-limiter.js';
