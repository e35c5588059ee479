import type {CancellationRecord} from '../types';

import {describe, expect, it, vi} from 'vitest';
import {trace} from '@opentelemetry/api';

import {CANCELLED_EVENT, fanout, telemetrySink} from './with-telemetry';

describe('telemetrySink', () => {
  function createSpan() {
    return trace.getTracer('timeout-link-test').startSpan('request');
  }

  it('should record cancellation as a span event', () => {
    const span = createSpan();
    const addEventSpy = vi.spyOn(span, 'addEvent');
    const sink = telemetrySink(() => span);

    sink.warn({cause: 'deadline', path: '/orders/42', remainingMs: 50, budgetMs: 40}, 'Request cancelled');

    expect(addEventSpy).toHaveBeenCalledTimes(1);
    expect(addEventSpy).toHaveBeenCalledWith(CANCELLED_EVENT, {
      'timeout_link.message': 'Request cancelled',
      'timeout_link.cause': 'deadline',
      'timeout_link.path': '/orders/42',
      'timeout_link.remainingMs': 50,
      'timeout_link.budgetMs': 40,
    });
  });

  it('should drop fields that are not attribute values', () => {
    const span = createSpan();
    const addEventSpy = vi.spyOn(span, 'addEvent');
    const sink = telemetrySink(() => span);

    sink.warn({cause: 'disconnect', path: '/', remainingMs: undefined}, 'Request cancelled');

    expect(addEventSpy).toHaveBeenCalledWith(CANCELLED_EVENT, {
      'timeout_link.message': 'Request cancelled',
      'timeout_link.cause': 'disconnect',
      'timeout_link.path': '/',
    });
  });

  it('should do nothing without a span', () => {
    const sink = telemetrySink(() => undefined);

    expect(() => sink.warn({cause: 'deadline', path: '/'}, 'Request cancelled')).not.toThrow();
  });

  it('should use the active span by default', () => {
    expect(trace.getActiveSpan()).toBeUndefined();
    expect(() => telemetrySink().warn({cause: 'deadline', path: '/'}, 'Request cancelled')).not.toThrow();
  });
});

describe('fanout', () => {
  it('should forward every record to every sink in order', () => {
    const calls: string[] = [];
    const first = {warn: vi.fn((_record: CancellationRecord, _message: string) => calls.push('first'))};
    const second = {warn: vi.fn((_record: CancellationRecord, _message: string) => calls.push('second'))};
    const record: CancellationRecord = {cause: 'deadline', path: '/'};

    fanout(first, second).warn(record, 'Request cancelled');

    expect(calls).toEqual(['first', 'second']);
    expect(first.warn).toHaveBeenCalledWith(record, 'Request cancelled');
    expect(second.warn).toHaveBeenCalledWith(record, 'Request cancelled');
  });
});
