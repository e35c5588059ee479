import type {Budget} from '../budget';
import type {CancellationRecord, DiagnosticSink, GateOptions, GateOutcome, Pipeline, RequestScope} from '../types';

import {Attribution, GATEWAY_TIMEOUT, statusFor} from '../attribution';
import {computeBudget, isExhausted, safetyBuffer} from '../budget';
import {armDeadline, isCancellation, linkSignals} from '../cancellation';
import {getHostContext} from '../host';

/**
 * Links the host's execution deadline with the request's own cancellation.
 *
 * For every request the gate derives one `AbortSignal` that aborts when either
 * - the original `scope.signal` aborts (client disconnect, server abort), or
 * - the host's remaining time minus the safety buffer runs out.
 *
 * The combined signal replaces `scope.signal` while the pipeline runs, so
 * downstream code observes both through the usual `AbortSignal` patterns.
 * Cancellations the gate caused end the response with an empty 504 (deadline)
 * or 499 (disconnect); any other pipeline error propagates unchanged.
 *
 * Without a host context (local development) no deadline timer is armed and
 * only the original signal is operative.
 *
 * @example
 * ```typescript
 * const gate = new TimeoutLinkGate(handle, logger, {safetyBufferMs: 500});
 *
 * await gate.invoke(scope);
 * ```
 */
export class TimeoutLinkGate<S extends RequestScope = RequestScope> {
  private readonly next: Pipeline<S>;

  private readonly sink: DiagnosticSink;

  readonly safetyBufferMs: number;

  /**
   * @throws {TypeError} If `next` is not a function or `sink` has no `warn` method
   * @throws {RangeError} If `options.safetyBufferMs` is negative
   */
  constructor(next: Pipeline<S>, sink: DiagnosticSink, options: GateOptions = {}) {
    if (typeof next !== 'function') {
      throw new TypeError('next must be a function');
    }

    if (!sink || typeof sink.warn !== 'function') {
      throw new TypeError('sink must provide a warn method');
    }

    this.next = next;
    this.sink = sink;
    this.safetyBufferMs = safetyBuffer(options.safetyBufferMs);
  }

  /**
   * Runs the pipeline for one request under the combined signal.
   *
   * The original `scope.signal` is restored before this method returns or
   * throws, whatever the outcome.
   *
   * @throws {TypeError} If `scope` is missing
   * @throws Any pipeline error that is not a cancellation caused by this gate
   */
  async invoke(scope: S): Promise<GateOutcome> {
    if (!scope) {
      throw new TypeError('scope is required');
    }

    const original = scope.signal;

    try {
      const budget = computeBudget(getHostContext(scope.items), this.safetyBufferMs);

      if (isExhausted(budget)) {
        this.terminate(scope, GATEWAY_TIMEOUT);
        return 'short-circuited';
      }

      return await this.run(scope, original, budget);
    } finally {
      scope.signal = original;
    }
  }

  private async run(scope: S, original: AbortSignal, budget: Budget): Promise<GateOutcome> {
    const attribution = new Attribution();
    const deadline = armDeadline(budget);
    const link = linkSignals(original, deadline.signal, attribution);

    try {
      scope.signal = link.signal;

      try {
        await this.next(scope);
      } catch (error) {
        if (!link.signal.aborted || !(error === link.signal.reason || isCancellation(error))) {
          throw error;
        }
      }

      if (!link.signal.aborted) {
        return 'completed';
      }

      return this.cancel(scope, attribution, budget);
    } finally {
      link.dispose();
      deadline.clear();
    }
  }

  private cancel(scope: S, attribution: Attribution, budget: Budget): GateOutcome {
    const cause = attribution.decide();
    const record: CancellationRecord = {cause, path: scope.path};

    if (budget.kind === 'hosted') {
      record.remainingMs = budget.remainingMs;
      record.budgetMs = budget.budgetMs;
    }

    if (attribution.at !== undefined) {
      record.cancelledAt = attribution.at;
    }

    this.sink.warn(record, 'Request cancelled');
    this.terminate(scope, statusFor(cause));

    return cause === 'deadline' ? 'cancelled-deadline' : 'cancelled-disconnect';
  }

  private terminate(scope: S, status: number) {
    if (scope.response.hasStarted) {
      return;
    }

    scope.response.terminate(status);
  }
}
