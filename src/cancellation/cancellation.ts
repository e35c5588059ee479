import type {Attribution} from '../attribution';
import type {Budget} from '../budget';
import type {Cause} from '../types';

import {errorName, timer} from '../utils';

/**
 * Error used as the abort reason of the gate's signals.
 *
 * Downstream code may also throw it (or let `throwIfCancelled` throw it) to
 * unwind when it observes the request signal.
 *
 * @example
 * ```typescript
 * try {
 *   await fetch(url, {signal: req.signal});
 * } catch (error) {
 *   if (isCancellation(error)) {
 *     // request was cancelled, nothing more to do
 *   }
 *   throw error;
 * }
 * ```
 */
export class CancelledError extends Error {
  readonly reason: Cause | undefined;

  constructor(message = 'Operation was cancelled', reason?: Cause) {
    super(message);
    this.name = 'CancelledError';
    this.reason = reason;
  }
}

export class DeadlineExceededError extends CancelledError {
  readonly budgetMs: number;

  constructor(budgetMs: number) {
    super(`Execution budget of ${budgetMs}ms exhausted`, 'deadline');
    this.name = 'DeadlineExceededError';
    this.budgetMs = budgetMs;
  }
}

export class ClientClosedError extends CancelledError {
  constructor(message = 'Client closed request') {
    super(message, 'disconnect');
    this.name = 'ClientClosedError';
  }
}

/**
 * Checks if a thrown value means "cancelled": a `CancelledError`, or a DOM
 * `AbortError`/`TimeoutError` as produced by `AbortSignal` and `fetch`.
 */
export function isCancellation(error: unknown): boolean {
  if (error instanceof CancelledError) {
    return true;
  }

  const name = errorName(error);
  return name === 'AbortError' || name === 'TimeoutError';
}

/**
 * Throws when `signal` is aborted. The abort reason is rethrown as is when it
 * is a cancellation; anything else is wrapped into `CancelledError`.
 */
export function throwIfCancelled(signal: AbortSignal): void {
  if (!signal.aborted) {
    return;
  }

  if (isCancellation(signal.reason)) {
    throw signal.reason;
  }

  throw new CancelledError();
}

export type Deadline = {
  signal: AbortSignal;
  clear(): void;
};

/**
 * Arms the deadline trigger for a budget.
 *
 * A hosted budget aborts its signal with `DeadlineExceededError` once
 * `budgetMs` elapsed. An unhosted budget gets a signal that never aborts.
 */
export function armDeadline(budget: Budget): Deadline {
  const controller = new AbortController();

  if (budget.kind === 'unhosted') {
    return {signal: controller.signal, clear: () => {}};
  }

  const clear = timer(budget.budgetMs, () => controller.abort(new DeadlineExceededError(budget.budgetMs)));

  return {signal: controller.signal, clear};
}

export type Link = {
  signal: AbortSignal;
  dispose(): void;
};

/**
 * Combines the original request signal and the deadline signal.
 *
 * The combined signal aborts with the reason of whichever source aborts first.
 * Each source records itself in `attribution` before the combined signal
 * aborts, so listeners on the combined signal always see a decided cause.
 * `dispose` detaches from both sources.
 */
export function linkSignals(original: AbortSignal, deadline: AbortSignal, attribution: Attribution): Link {
  const controller = new AbortController();
  const detach: Array<() => void> = [];
  const sources: Array<[AbortSignal, Cause]> = [
    [original, 'disconnect'],
    [deadline, 'deadline'],
  ];

  for (const [source, cause] of sources) {
    if (source.aborted) {
      attribution.record(cause);
      controller.abort(source.reason);
      break;
    }

    const onAbort = () => {
      attribution.record(cause);
      controller.abort(source.reason);
    };

    source.addEventListener('abort', onAbort, {once: true});
    detach.push(() => source.removeEventListener('abort', onAbort));
  }

  return {
    signal: controller.signal,
    dispose: () => detach.forEach(remove => remove()),
  };
}
