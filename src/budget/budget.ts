import type {HostContext} from '../host';

export const DEFAULT_SAFETY_BUFFER_MS = 250;

/**
 * Time the downstream pipeline may spend on one request.
 *
 * - `hosted` - running under a host with a hard deadline; `budgetMs` is what is
 *   left of `remainingMs` after the safety buffer, never below zero.
 * - `unhosted` - no host deadline (local development, tests). No deadline timer
 *   is armed, so only the original request signal can cancel.
 */
export type Budget =
  | {kind: 'hosted'; remainingMs: number; budgetMs: number}
  | {kind: 'unhosted'};

/**
 * Validates a safety buffer value, returning the default when it is undefined.
 *
 * @throws {RangeError} If the value is negative or not a finite number
 */
export function safetyBuffer(value: number | undefined): number {
  const buffer = value ?? DEFAULT_SAFETY_BUFFER_MS;

  if (!Number.isFinite(buffer) || buffer < 0) {
    throw new RangeError(`Safety buffer cannot be negative. Received: ${buffer}`);
  }

  return buffer;
}

export function computeBudget(host: HostContext | undefined, safetyBufferMs: number): Budget {
  if (!host) {
    return {kind: 'unhosted'};
  }

  const remainingMs = host.getRemainingTimeInMillis();

  return {
    kind: 'hosted',
    remainingMs,
    budgetMs: remainingMs > safetyBufferMs ? remainingMs - safetyBufferMs : 0,
  };
}

export function isExhausted(budget: Budget): boolean {
  return budget.kind === 'hosted' && budget.budgetMs <= 0;
}
