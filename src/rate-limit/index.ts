/**
 * Rate Limit modules export
 */

export { TokenBucket } from './token-bucket';
export type { TokenBucketOptions } from './token-bucket';
export { DEFAULT_BACKOFF, ExponentialBackoff, sleep } from './backoff';
export type { BackoffConfig } from './backoff';
