import {describe, expect, it} from 'vitest';

import {ClientClosedError, isCancellation} from '../../../src';

import {buildReport} from './report';

describe('buildReport', () => {
  it('should sum row numbers', async () => {
    const report = await buildReport({rows: 4, stepMs: 0, signal: new AbortController().signal});

    expect(report).toEqual({rows: 4, checksum: 10});
  });

  it('should not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    const reason = new ClientClosedError();
    controller.abort(reason);

    await expect(buildReport({rows: 4, stepMs: 0, signal: controller.signal})).rejects.toBe(reason);
  });

  it('should stop with a cancellation once the signal aborts', async () => {
    const controller = new AbortController();
    const pending = buildReport({rows: 1000, stepMs: 5, signal: controller.signal});

    controller.abort();

    const error = await pending.catch((e: unknown) => e);
    expect(isCancellation(error)).toBe(true);
  });
});
