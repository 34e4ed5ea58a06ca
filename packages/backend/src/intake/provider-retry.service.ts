import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { numberSetting } from '../config/app.config';
import { MetricsService } from '../metrics/metrics.service';
import { ProviderError, errorMessage } from './intake.errors';
import { isPlainObject } from './record-patch';
import {
  ClassifiedFailure,
  PROVIDER_RETRY_CONFIG,
  ProviderErrorCode,
  RetryAttempt,
  RetryStrategy,
} from './provider-retry.types';

const MAX_DELAY_MS = 30000;

export interface RetryOptions {
  signal?: AbortSignal;
}

/**
 * Retries model provider calls according to the failure class.
 *
 * Rate limits back off exponentially, transient network and server failures
 * retry after a short delay, and client errors or cancellations fail at once.
 */
@Injectable()
export class ProviderRetryService {
  private readonly logger = new Logger(ProviderRetryService.name);
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;

  constructor(
    config: ConfigService,
    private readonly metrics: MetricsService,
  ) {
    this.maxRetries = numberSetting(config, 'PROVIDER_MAX_RETRIES', 3);
    this.baseDelayMs = numberSetting(config, 'PROVIDER_RETRY_BASE_MS', 500);
  }

  /**
   * Map an SDK or network error to a provider error code
   */
  classify(error: unknown, signal?: AbortSignal): ClassifiedFailure {
    const message = errorMessage(error);

    if (error instanceof ProviderError) {
      return { code: error.providerCode, message };
    }
    if (signal?.aborted || (error instanceof Error && error.name === 'AbortError')) {
      return { code: ProviderErrorCode.ABORTED, message };
    }
    if (error instanceof Error && error.name === 'APIUserAbortError') {
      return { code: ProviderErrorCode.ABORTED, message };
    }

    const details: Record<string, unknown> = isPlainObject(error) ? error : {};
    const status = typeof details.status === 'number' ? details.status : undefined;
    const retryAfterMs = this.extractRetryAfter(details.headers);

    let code: ProviderErrorCode;
    switch (status) {
      case 401:
      case 403:
        code = ProviderErrorCode.AUTHENTICATION_FAILED;
        break;
      case 408:
        code = ProviderErrorCode.NETWORK_TIMEOUT;
        break;
      case 429:
        code = ProviderErrorCode.RATE_LIMIT_EXCEEDED;
        break;
      case 529:
        code = ProviderErrorCode.OVERLOADED;
        break;
      case undefined:
        if (/timed? ?out|ETIMEDOUT/i.test(message)) {
          code = ProviderErrorCode.NETWORK_TIMEOUT;
        } else if (/ECONNRESET|connection error|socket hang up/i.test(message)) {
          code = ProviderErrorCode.CONNECTION_RESET;
        } else {
          code = ProviderErrorCode.UNKNOWN_ERROR;
        }
        break;
      default:
        if (status >= 500) {
          code = ProviderErrorCode.SERVICE_UNAVAILABLE;
        } else if (status >= 400) {
          code = ProviderErrorCode.INVALID_REQUEST;
        } else {
          code = ProviderErrorCode.UNKNOWN_ERROR;
        }
    }

    return { code, message, retryAfterMs };
  }

  /**
   * Run `fn`, retrying classified transient failures.
   * @throws ProviderError once the budget is spent or the failure is fatal
   */
  async execute<T>(operation: string, fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
    const attempts: RetryAttempt[] = [];

    for (let attempt = 0; ; attempt++) {
      this.throwIfAborted(operation, attempts, options.signal);

      try {
        return await fn();
      } catch (error) {
        const failure = this.classify(error, options.signal);
        const retryConfig = PROVIDER_RETRY_CONFIG[failure.code];

        const retryAttempt: RetryAttempt = {
          attemptNumber: attempt + 1,
          timestamp: new Date().toISOString(),
          errorCode: failure.code,
          errorMessage: failure.message,
        };
        attempts.push(retryAttempt);

        this.logger.warn(
          `${operation} failed (attempt ${attempt + 1}): ${failure.code} - ${failure.message}`,
        );

        if (retryConfig.strategy === RetryStrategy.NONE || attempt >= this.maxRetries) {
          this.metrics.recordProviderFailure(operation, failure.code);
          throw new ProviderError(
            `${operation} failed after ${attempts.length} attempt(s): ${failure.message}`,
            failure.code,
            retryConfig.strategy !== RetryStrategy.NONE,
            attempts,
            error,
          );
        }

        const delayMs = this.delayFor(retryConfig.strategy, retryConfig.delayFactor, attempt, failure.retryAfterMs);
        retryAttempt.waitedMs = delayMs;
        this.metrics.recordProviderRetry(operation, failure.code);
        this.logger.log(`Waiting ${delayMs}ms before retry ${attempt + 2} of ${operation}`);

        await this.delay(delayMs, operation, attempts, options.signal);
      }
    }
  }

  private delayFor(
    strategy: RetryStrategy,
    delayFactor: number,
    attempt: number,
    retryAfterMs?: number,
  ): number {
    const base = this.baseDelayMs * delayFactor;
    const computed = strategy === RetryStrategy.EXPONENTIAL_BACKOFF ? Math.pow(2, attempt) * base : base;
    return Math.min(MAX_DELAY_MS, retryAfterMs ? Math.max(computed, retryAfterMs) : computed);
  }

  /**
   * retry-after is in seconds
   */
  private extractRetryAfter(headers: unknown): number | undefined {
    if (!isPlainObject(headers)) {
      return undefined;
    }
    const retryAfter = headers['retry-after'];
    if (typeof retryAfter !== 'string') {
      return undefined;
    }
    const seconds = parseInt(retryAfter, 10);
    return Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : undefined;
  }

  private throwIfAborted(operation: string, attempts: RetryAttempt[], signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new ProviderError(`${operation} was cancelled`, ProviderErrorCode.ABORTED, false, attempts);
    }
  }

  private delay(ms: number, operation: string, attempts: RetryAttempt[], signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer);
        reject(new ProviderError(`${operation} was cancelled`, ProviderErrorCode.ABORTED, false, attempts));
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
