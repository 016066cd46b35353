export { TokenBucketRateLimiter } from "./rate-limiter.js";
export type { AcquireOptions, RateLimiterConfig, RateLimiterStats } from "./rate-limiter.js";
