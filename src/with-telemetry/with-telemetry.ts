import type {CancellationRecord, DiagnosticSink} from '../types';
import type {Attributes, Span} from '@opentelemetry/api';

import {trace} from '@opentelemetry/api';

import {isAttributeValue} from '../utils';

export const CANCELLED_EVENT = 'timeout-link.cancelled';

/**
 * Diagnostic sink that records gate cancellations as events on an OpenTelemetry span.
 *
 * Record fields become event attributes prefixed with `timeout_link.`; fields
 * that are not valid attribute values (e.g. absent host timings) are dropped.
 * Does nothing when there is no span.
 *
 * @param getSpan - Span lookup, the active span by default
 *
 * @example
 * ```typescript
 * const gate = new TimeoutLinkGate(next, fanout(logger, telemetrySink()));
 * ```
 */
export function telemetrySink(getSpan: () => Span | undefined = () => trace.getActiveSpan()): DiagnosticSink {
  return {
    warn(record: CancellationRecord, message: string) {
      const span = getSpan();
      if (!span) {
        return;
      }

      const attributes: Attributes = {'timeout_link.message': message};
      for (const [key, value] of Object.entries(record)) {
        if (isAttributeValue(value)) {
          attributes[`timeout_link.${key}`] = value;
        }
      }

      span.addEvent(CANCELLED_EVENT, attributes);
    },
  };
}

/**
 * Forwards each record to every sink, in order.
 */
export function fanout(...sinks: DiagnosticSink[]): DiagnosticSink {
  return {
    warn(record: CancellationRecord, message: string) {
      for (const sink of sinks) {
        sink.warn(record, message);
      }
    },
  };
}
