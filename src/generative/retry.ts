/**
 * Retry Middleware
 * Exponential backoff for retryable generative failures
 */

import { GenerationCancelledError, GenerativeServiceError, RateLimitedError } from '../errors';
import { createLogger } from '../logger';
import type { GenerateRequest, GenerateResult, GenerativeService, RetryPolicy } from './types';

const log = createLogger('Retry');

// ============================================================================
// Default Retry Policy
// ============================================================================

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  initialDelayMs: 1000,
  maxDelayMs: 30_000,
  backoffMultiplier: 2,
  jitter: false,
};

// ============================================================================
// Retry Wrapper
// ============================================================================

export class RetryingService implements GenerativeService {
  readonly name: string;

  constructor(
    private inner: GenerativeService,
    private policy: RetryPolicy = DEFAULT_RETRY_POLICY
  ) {
    this.name = inner.name;
  }

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    let attempt = 0;

    while (true) {
      try {
        return await this.inner.generate(request);
      } catch (error) {
        if (!isRetryable(error) || attempt >= this.policy.maxRetries) {
          throw error;
        }

        attempt++;
        const delay = this.calculateDelay(attempt, error);
        log.warn(
          `${this.name} ${error.kind}: retrying in ${delay}ms (attempt ${attempt}/${this.policy.maxRetries})`
        );
        await sleep(delay, this.name, request.signal);
      }
    }
  }

  /**
   * initialDelay * multiplier^(attempt - 1), at least retryAfter, capped
   */
  calculateDelay(attempt: number, error?: GenerativeServiceError): number {
    let delay = this.policy.initialDelayMs * Math.pow(this.policy.backoffMultiplier, attempt - 1);

    if (error instanceof RateLimitedError && error.retryAfterMs !== undefined) {
      delay = Math.max(delay, error.retryAfterMs);
    }

    delay = Math.min(delay, this.policy.maxDelayMs);

    if (this.policy.jitter) {
      const jitterAmount = delay * 0.2;
      delay = delay - jitterAmount + Math.random() * jitterAmount * 2;
    }

    return Math.floor(delay);
  }
}

function isRetryable(error: unknown): error is GenerativeServiceError {
  return error instanceof GenerativeServiceError && error.retryable;
}

function sleep(ms: number, provider: string, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new GenerationCancelledError(provider));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new GenerationCancelledError(provider));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// ============================================================================
// Factory Function
// ============================================================================

/**
 * Wrap a service with retry middleware
 */
export function withRetry(service: GenerativeService, policy: Partial<RetryPolicy> = {}): GenerativeService {
  return new RetryingService(service, { ...DEFAULT_RETRY_POLICY, ...policy });
}
