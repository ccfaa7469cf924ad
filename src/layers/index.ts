export { CacheLayer, deserializeMetadata, serializeMetadata, type CacheOptions } from './cache.js';
export { ConcurrentLimitLayer, type ConcurrentLimitOptions } from './concurrent-limit.js';
export { LoggingLayer, type LoggingOptions } from './logging.js';
export {
  InMemoryMetrics,
  MetricsLayer,
  type MetricSample,
  type MetricsRecorder,
  type OperationMetrics,
} from './metrics.js';
export { MimeGuessLayer, guessMimeType } from './mime-guess.js';
export { RetryLayer, isRetryable, type RetryOptions } from './retry.js';
export { ThrottleLayer, TokenBucket, type ThrottleOptions } from './throttle.js';
export { TimeoutLayer, type TimeoutOptions } from './timeout.js';
