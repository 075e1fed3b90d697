/**
 * Fan-out barrier.
 *
 * Starts a bounded set of concurrent tasks and resolves once every task has
 * settled, or as soon as `stopWhen` accepts a fulfilled value. On early close
 * the shared signal is aborted and unsettled tasks are reported as abandoned;
 * anything they produce afterwards is dropped.
 */

import { toError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('barrier');

export type BarrierTask<T> = (signal: AbortSignal) => Promise<T>;

export type BarrierOutcome<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; error: Error }
  | { status: 'abandoned' };

export interface BarrierOptions<T> {
  /** Close the barrier early when this returns true for a fulfilled value */
  stopWhen?: (value: T, index: number) => boolean;
  /** Label for log lines */
  name?: string;
}

/**
 * Outcomes are returned in task order, whatever order the tasks settled in.
 */
export function awaitBarrier<T>(
  tasks: readonly BarrierTask<T>[],
  options: BarrierOptions<T> = {}
): Promise<BarrierOutcome<T>[]> {
  if (tasks.length === 0) {
    return Promise.resolve([]);
  }

  return new Promise((resolve) => {
    const controller = new AbortController();
    const outcomes: (BarrierOutcome<T> | undefined)[] = tasks.map(() => undefined);
    let remaining = tasks.length;
    let closed = false;

    const close = (early: boolean): void => {
      if (closed) {
        return;
      }
      closed = true;
      if (early) {
        controller.abort();
        log.debug({ barrier: options.name, abandoned: remaining }, 'Barrier closed early');
      }
      resolve(outcomes.map((o) => o ?? { status: 'abandoned' }));
    };

    const settle = (index: number, outcome: BarrierOutcome<T>): void => {
      if (closed) {
        log.debug({ barrier: options.name, index, status: outcome.status }, 'Discarding late result');
        return;
      }
      outcomes[index] = outcome;
      remaining--;

      if (outcome.status === 'fulfilled' && options.stopWhen?.(outcome.value, index)) {
        close(remaining > 0);
        return;
      }
      if (remaining === 0) {
        close(false);
      }
    };

    tasks.forEach((task, index) => {
      Promise.resolve()
        .then(() => task(controller.signal))
        .then(
          (value) => settle(index, { status: 'fulfilled', value }),
          (error: unknown) => settle(index, { status: 'rejected', error: toError(error) })
        );
    });
  });
}
