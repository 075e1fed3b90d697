/**
 * Retry Policy Engine
 *
 * Bounded retry with exponential backoff for collaborator calls. Each call
 * carries its own engine run, so one call's retries never delay a sibling.
 */

import { CallErrorType } from '../types/index.js';
import { CallCancelledError } from '../errors/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('retry-policy');

/**
 * Configuration for retry behavior.
 */
export interface RetryPolicy {
  /** Total attempts including the first one (1 = no retries) */
  maxAttempts: number;

  /** Delay before the first retry in milliseconds */
  initialIntervalMs: number;

  /** Backoff multiplier for exponential backoff */
  backoffCoefficient: number;

  /** Maximum backoff delay in milliseconds */
  maxIntervalMs: number;

  /** Error types that are retryable */
  retryableErrors: CallErrorType[];

  /** Whether to add jitter to backoff (0-25% of backoff value) */
  jitter: boolean;
}

/**
 * Result of evaluating whether to retry.
 */
export interface RetryEvaluation {
  shouldRetry: boolean;
  /** Delay in milliseconds before retry (0 if shouldRetry is false) */
  delayMs: number;
  reason: string;
}

/**
 * Summary of all retry attempts for an operation.
 * `attempts` counts every attempt made, including the first.
 */
export type RetryResult<T> =
  | { success: true; result: T; attempts: number; totalDurationMs: number }
  | {
      success: false;
      finalError: Error;
      finalErrorType: CallErrorType;
      attempts: number;
      totalDurationMs: number;
    };

export interface RetryExecuteOptions {
  classify: (error: Error) => CallErrorType;
  signal?: AbortSignal | undefined;
  /** Extra fields for log lines */
  context?: Record<string, unknown> | undefined;
}

/**
 * Default retry policy: 2s, 4s, 8s between four attempts, capped at 30s.
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  initialIntervalMs: 2000,
  backoffCoefficient: 2,
  maxIntervalMs: 30000,
  retryableErrors: [
    CallErrorType.TIMEOUT,
    CallErrorType.INVALID_OUTPUT,
    CallErrorType.COLLABORATOR_ERROR,
    CallErrorType.UNKNOWN,
  ],
  jitter: true,
};

/**
 * No retry policy - for deterministic testing or when retries are undesirable.
 */
export const NO_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 1,
  initialIntervalMs: 0,
  backoffCoefficient: 1,
  maxIntervalMs: 0,
  retryableErrors: [],
  jitter: false,
};

/**
 * RetryPolicyEngine - Executes operations with configurable retry logic.
 */
export class RetryPolicyEngine {
  private readonly policy: RetryPolicy;

  constructor(policy: RetryPolicy = DEFAULT_RETRY_POLICY) {
    this.policy = policy;
  }

  getPolicy(): RetryPolicy {
    return { ...this.policy, retryableErrors: [...this.policy.retryableErrors] };
  }

  /**
   * Evaluate whether a failed attempt should be retried.
   *
   * @param attemptCount - Attempts already made (1 after the first failure)
   */
  evaluateRetry(errorType: CallErrorType, attemptCount: number): RetryEvaluation {
    if (attemptCount >= this.policy.maxAttempts) {
      return {
        shouldRetry: false,
        delayMs: 0,
        reason: `Max attempts (${this.policy.maxAttempts}) exhausted`,
      };
    }

    if (!this.isRetryable(errorType)) {
      return {
        shouldRetry: false,
        delayMs: 0,
        reason: `Error type '${errorType}' is not retryable`,
      };
    }

    const delayMs = this.calculateBackoff(attemptCount - 1);

    return {
      shouldRetry: true,
      delayMs,
      reason: `Retrying after ${delayMs}ms (attempt ${attemptCount + 1}/${this.policy.maxAttempts})`,
    };
  }

  /**
   * Execute an operation with retry logic.
   * An aborted signal stops the loop; the abort is reported as a cancellation.
   */
  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryExecuteOptions
  ): Promise<RetryResult<T>> {
    const startTime = Date.now();
    let lastError: Error = new CallCancelledError();
    let lastErrorType: CallErrorType = CallErrorType.CANCELLED;
    let attempts = 0;

    while (attempts < this.policy.maxAttempts) {
      if (options.signal?.aborted) {
        lastError = new CallCancelledError();
        lastErrorType = CallErrorType.CANCELLED;
        break;
      }

      attempts++;
      try {
        const result = await operation(attempts);
        return {
          success: true,
          result,
          attempts,
          totalDurationMs: Date.now() - startTime,
        };
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        lastErrorType = options.classify(lastError);

        const evaluation = this.evaluateRetry(lastErrorType, attempts);
        if (!evaluation.shouldRetry) {
          log.warn(
            { ...options.context, attempts, errorType: lastErrorType, reason: evaluation.reason },
            'No more retries, failing'
          );
          break;
        }

        log.info(
          { ...options.context, attempts, nextRetryMs: evaluation.delayMs, error: lastError.message },
          'Retrying call'
        );
        const completed = await this.sleep(evaluation.delayMs, options.signal);
        if (!completed) {
          lastError = new CallCancelledError();
          lastErrorType = CallErrorType.CANCELLED;
          break;
        }
      }
    }

    return {
      success: false,
      finalError: lastError,
      finalErrorType: lastErrorType,
      attempts,
      totalDurationMs: Date.now() - startTime,
    };
  }

  isRetryable(errorType: CallErrorType): boolean {
    return this.policy.retryableErrors.includes(errorType);
  }

  /**
   * Calculate backoff delay for a given retry number (0 = first retry).
   */
  calculateBackoff(retryNumber: number): number {
    const base = this.policy.initialIntervalMs * Math.pow(this.policy.backoffCoefficient, retryNumber);
    const capped = Math.min(base, this.policy.maxIntervalMs);

    if (this.policy.jitter) {
      const jitter = capped * 0.25 * Math.random();
      return Math.round(capped + jitter);
    }

    return Math.round(capped);
  }

  /**
   * Sleep for a specified duration. Resolves false if the signal aborts first.
   */
  private sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve(false);
        return;
      }
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve(false);
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve(true);
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

/**
 * Create a RetryPolicyEngine with custom policy.
 *
 * @param policy - Partial policy to merge with defaults
 */
export function createRetryPolicyEngine(policy?: Partial<RetryPolicy>): RetryPolicyEngine {
  return new RetryPolicyEngine({
    ...DEFAULT_RETRY_POLICY,
    ...policy,
  });
}
