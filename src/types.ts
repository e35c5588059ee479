/**
 * Which of the two linked triggers cancelled a request.
 *
 * - `deadline` - the host's remaining time dropped below the safety buffer
 * - `disconnect` - the original request signal aborted (client gone, server abort)
 */
export type Cause = 'deadline' | 'disconnect';

/**
 * Terminal result of one pass through the gate.
 */
export type GateOutcome = 'completed' | 'short-circuited' | 'cancelled-deadline' | 'cancelled-disconnect';

/**
 * Where the gate writes its terminal status.
 * At most one call to `terminate` is made, and never once `hasStarted` is true.
 */
export interface ResponseSink {
  readonly hasStarted: boolean;

  /**
   * Ends the response with the given status and an empty body.
   */
  terminate(status: number): void;
}

/**
 * The part of a request the gate works with.
 *
 * `signal` is a mutable slot: the gate borrows it for the duration of the
 * request and always puts the original value back before returning.
 */
export interface RequestScope {
  readonly path: string;
  signal: AbortSignal;
  readonly items: Readonly<Record<string, unknown>>;
  readonly response: ResponseSink;
}

export type Pipeline<S extends RequestScope = RequestScope> = (scope: S) => Promise<void> | void;

/**
 * Structured record emitted when the gate handles a cancellation it caused.
 */
export type CancellationRecord = {
  cause: Cause;
  path: string;
  remainingMs?: number;
  budgetMs?: number;
  /**
   * Epoch milliseconds at which the winning trigger fired.
   */
  cancelledAt?: number;
};

/**
 * Receiver of gate diagnostics. A pino `Logger` satisfies this shape.
 */
export interface DiagnosticSink {
  warn(record: CancellationRecord, message: string): void;
}

export type GateOptions = {
  /**
   * Time subtracted from the host's remaining time, in milliseconds.
   * Defaults to 250.
   */
  safetyBufferMs?: number;
};
