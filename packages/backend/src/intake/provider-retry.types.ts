/**
 * Provider Error Types
 *
 * Failure codes for calls to the hosted model, and how each one is retried.
 */

export enum ProviderErrorCode {
  // === IMMEDIATE RETRY (Network/Transient) ===
  NETWORK_TIMEOUT = 'NETWORK_TIMEOUT',
  CONNECTION_RESET = 'CONNECTION_RESET',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  OVERLOADED = 'OVERLOADED',
  MALFORMED_RESPONSE = 'MALFORMED_RESPONSE',

  // === EXPONENTIAL BACKOFF (Rate Limits) ===
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',

  // === NO RETRY (Fatal) ===
  AUTHENTICATION_FAILED = 'AUTHENTICATION_FAILED',
  INVALID_REQUEST = 'INVALID_REQUEST',
  ABORTED = 'ABORTED',

  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export enum RetryStrategy {
  /** Retry after a short fixed delay */
  IMMEDIATE = 'immediate',
  /** Wait base * 2^attempt before each retry */
  EXPONENTIAL_BACKOFF = 'exponential_backoff',
  /** Do not retry */
  NONE = 'none',
}

export interface RetryConfig {
  strategy: RetryStrategy;
  /** Multiplier applied to the configured base delay */
  delayFactor: number;
}

export interface RetryAttempt {
  attemptNumber: number;
  timestamp: string;
  errorCode: ProviderErrorCode;
  errorMessage: string;
  waitedMs?: number;
}

export interface ClassifiedFailure {
  code: ProviderErrorCode;
  message: string;
  retryAfterMs?: number;
}

export const PROVIDER_RETRY_CONFIG: Record<ProviderErrorCode, RetryConfig> = {
  [ProviderErrorCode.NETWORK_TIMEOUT]: { strategy: RetryStrategy.IMMEDIATE, delayFactor: 1 },
  [ProviderErrorCode.CONNECTION_RESET]: { strategy: RetryStrategy.IMMEDIATE, delayFactor: 1 },
  [ProviderErrorCode.SERVICE_UNAVAILABLE]: { strategy: RetryStrategy.IMMEDIATE, delayFactor: 2 },
  [ProviderErrorCode.OVERLOADED]: { strategy: RetryStrategy.EXPONENTIAL_BACKOFF, delayFactor: 2 },
  [ProviderErrorCode.MALFORMED_RESPONSE]: { strategy: RetryStrategy.IMMEDIATE, delayFactor: 0 },
  [ProviderErrorCode.RATE_LIMIT_EXCEEDED]: {
    strategy: RetryStrategy.EXPONENTIAL_BACKOFF,
    delayFactor: 2,
  },
  [ProviderErrorCode.AUTHENTICATION_FAILED]: { strategy: RetryStrategy.NONE, delayFactor: 0 },
  [ProviderErrorCode.INVALID_REQUEST]: { strategy: RetryStrategy.NONE, delayFactor: 0 },
  [ProviderErrorCode.ABORTED]: { strategy: RetryStrategy.NONE, delayFactor: 0 },
  [ProviderErrorCode.UNKNOWN_ERROR]: { strategy: RetryStrategy.IMMEDIATE, delayFactor: 1 },
};
