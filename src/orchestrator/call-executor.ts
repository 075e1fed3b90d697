/**
 * Call executor: runs one collaborator call with a per-attempt timeout and
 * the retry policy. Collaborator failures are returned as data; only the
 * caller decides whether they matter.
 */

import { ZodError } from 'zod';
import { CallErrorType } from '../types/index.js';
import { CallCancelledError, CallTimeoutError, InvalidOutputError } from '../errors/index.js';
import { DEFAULT_RETRY_POLICY, RetryPolicyEngine } from './retry-policy.js';

export const DEFAULT_CALL_TIMEOUT_MS = 120_000;

export type CallOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; errorType: CallErrorType; error: string; attempts: number };

export interface CallExecutorOptions {
  /** Maximum wait for a single attempt */
  timeoutMs?: number;
  retry?: RetryPolicyEngine;
}

export function classifyCallError(error: Error): CallErrorType {
  if (error instanceof CallTimeoutError) {
    return CallErrorType.TIMEOUT;
  }
  if (error instanceof CallCancelledError) {
    return CallErrorType.CANCELLED;
  }
  if (error instanceof InvalidOutputError || error instanceof ZodError) {
    return CallErrorType.INVALID_OUTPUT;
  }
  return CallErrorType.COLLABORATOR_ERROR;
}

/**
 * Run `invoke` with its own abort signal that fires on timeout or when `outer` aborts.
 * A result that arrives after either is ignored.
 */
export function runWithTimeout<T>(
  invoke: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  outer?: AbortSignal
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const controller = new AbortController();
    let settled = false;

    const finish = (settle: () => void): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      outer?.removeEventListener('abort', onOuterAbort);
      settle();
    };

    const timer = setTimeout(() => {
      controller.abort();
      finish(() => reject(new CallTimeoutError(timeoutMs)));
    }, timeoutMs);

    const onOuterAbort = (): void => {
      controller.abort();
      finish(() => reject(new CallCancelledError()));
    };

    if (outer?.aborted) {
      onOuterAbort();
      return;
    }
    outer?.addEventListener('abort', onOuterAbort, { once: true });

    Promise.resolve()
      .then(() => invoke(controller.signal))
      .then(
        (value) => finish(() => resolve(value)),
        (error: unknown) => finish(() => reject(error))
      );
  });
}

export class CallExecutor {
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicyEngine;

  constructor(options: CallExecutorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.retry = options.retry ?? new RetryPolicyEngine(DEFAULT_RETRY_POLICY);
  }

  async execute<T>(
    invoke: (signal: AbortSignal) => Promise<T>,
    options: { signal?: AbortSignal; context?: Record<string, unknown> } = {}
  ): Promise<CallOutcome<T>> {
    const result = await this.retry.execute(
      () => runWithTimeout(invoke, this.timeoutMs, options.signal),
      { classify: classifyCallError, signal: options.signal, context: options.context }
    );

    if (result.success) {
      return { ok: true, value: result.result, attempts: result.attempts };
    }

    return {
      ok: false,
      errorType: result.finalErrorType,
      error: result.finalError.message,
      attempts: result.attempts,
    };
  }
}
