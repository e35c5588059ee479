import type {AttributeValue} from '@opentelemetry/api';

/**
 * Checks if a value is an object carrying the given property.
 *
 * @example
 * ```typescript
 * has(context, 'getRemainingTimeInMillis') // narrows context to Record<'getRemainingTimeInMillis', unknown>
 * ```
 */
export function has<K extends PropertyKey>(obj: unknown, prop: K): obj is Record<K, unknown> {
  if (obj === null || obj === undefined || typeof obj !== 'object') {
    return false;
  }

  return prop in obj;
}

// Largest delay setTimeout accepts; anything above fires after 1ms.
const MAX_DELAY = 2 ** 31 - 1;

/**
 * Starts an unref'd timer that calls `callback` after `delay` milliseconds.
 * Delays past the setTimeout limit are waited out in several steps.
 * Returns a function that cancels it; calling it more than once is harmless.
 */
export function timer(delay: number, callback: () => void): () => void {
  let handle: ReturnType<typeof setTimeout> | undefined;

  const arm = (left: number) => {
    handle = left > MAX_DELAY ? setTimeout(() => arm(left - MAX_DELAY), MAX_DELAY) : setTimeout(callback, left);
    handle.unref();
  };

  arm(delay);

  return () => clearTimeout(handle);
}

/**
 * Reads the `name` of an error-like value (Error, DOMException, or a plain object).
 */
export function errorName(value: unknown): string | undefined {
  if (!has(value, 'name')) {
    return undefined;
  }

  return typeof value.name === 'string' ? value.name : undefined;
}

/** Checks if value is a valid OpenTelemetry attribute (string/number/boolean/array of these). */
export function isAttributeValue(value: unknown): value is AttributeValue {
  if (value == null) {
    return false;
  }

  const t = typeof value;
  if (t === 'string' || t === 'number' || t === 'boolean') {
    return true;
  }

  if (Array.isArray(value)) {
    return value.every(item => {
      const it = typeof item;
      return item != null && (it === 'string' || it === 'number' || it === 'boolean');
    });
  }

  return false;
}
