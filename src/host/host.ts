import {AsyncLocalStorage} from 'node:async_hooks';

import {has} from '../utils';

/**
 * Remaining-time oracle provided by the Lambda runtime.
 * Structurally compatible with the `context` argument of a Lambda handler.
 */
export interface HostContext {
  getRemainingTimeInMillis(): number;
}

/**
 * Request-scoped key under which the host context is stored.
 */
export const LAMBDA_CONTEXT = 'lambdaContext';

const invocations = new AsyncLocalStorage<HostContext>();

export function isHostContext(value: unknown): value is HostContext {
  return has(value, 'getRemainingTimeInMillis') && typeof value.getRemainingTimeInMillis === 'function';
}

/**
 * Returns the host context stored in request-scoped `items`, if any.
 *
 * Absence is the expected state outside Lambda (local development, tests),
 * not an error.
 */
export function getHostContext(items: Readonly<Record<string, unknown>>): HostContext | undefined {
  const value = items[LAMBDA_CONTEXT];

  return isHostContext(value) ? value : undefined;
}

/**
 * Runs `fn` with `context` as the active invocation.
 *
 * Intended for the Lambda entry point, so that anything handling the
 * request further down the async chain can reach the remaining-time oracle.
 *
 * @example
 * ```typescript
 * export const handler = (event: unknown, context: HostContext) =>
 *   runInvocation(context, () => proxy(event, context));
 * ```
 */
export function runInvocation<T>(context: HostContext, fn: () => T): T {
  return invocations.run(context, fn);
}

export function currentInvocation(): HostContext | undefined {
  return invocations.getStore();
}
