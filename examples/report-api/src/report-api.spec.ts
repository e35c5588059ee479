/**
 * Integration tests for the report API behind the timeout gate.
 *
 * Each test starts the app on an ephemeral port and talks to it over HTTP.
 */

import type {CancellationRecord, TimeoutLinkOptions} from '../../../src';
import type {Server} from 'http';
import type {AddressInfo} from 'net';

import {createServer} from 'http';

import {afterEach, describe, expect, it, vi} from 'vitest';

import {createApp} from './server';

let server: Server | null = null;

async function start(options: TimeoutLinkOptions) {
  server = createServer(createApp(options));
  const listening = server;

  await new Promise<void>(resolve => listening.listen(0, '127.0.0.1', () => resolve()));

  const address: AddressInfo | string | null = listening.address();
  if (!address || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }

  return `http://127.0.0.1:${address.port}`;
}

function createSink() {
  return {warn: vi.fn((_record: CancellationRecord, _message: string) => {})};
}

const host = (remainingMs: number) => () => ({getRemainingTimeInMillis: () => remainingMs});

describe('report-api', () => {
  afterEach(async () => {
    const running = server;
    server = null;

    if (running) {
      running.closeAllConnections();
      await new Promise<void>(resolve => running.close(() => resolve()));
    }
  });

  it('should build a report when running locally', async () => {
    const url = await start({sink: createSink()});

    const response = await fetch(`${url}/api/reports?rows=3&stepMs=1`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({rows: 3, checksum: 6});
  });

  it('should build a report when the invocation has time left', async () => {
    const sink = createSink();
    const url = await start({sink, resolveHost: host(60 * 1000)});

    const response = await fetch(`${url}/api/reports?rows=5&stepMs=1`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({rows: 5, checksum: 15});
    expect(sink.warn).not.toHaveBeenCalled();
  });

  it('should answer 504 when the report outlives the invocation', async () => {
    const sink = createSink();
    const url = await start({sink, safetyBufferMs: 10, resolveHost: host(60)});

    const response = await fetch(`${url}/api/reports?rows=1000&stepMs=10`);

    expect(response.status).toBe(504);
    expect(await response.text()).toBe('');
    expect(sink.warn).toHaveBeenCalledWith(
      {cause: 'deadline', path: '/api/reports', remainingMs: 60, budgetMs: 50, cancelledAt: expect.any(Number)},
      'Request cancelled',
    );
  });

  it('should refuse work when the invocation is out of time on arrival', async () => {
    const sink = createSink();
    const url = await start({sink, safetyBufferMs: 200, resolveHost: host(100)});

    const response = await fetch(`${url}/api/reports?rows=1&stepMs=0`);

    expect(response.status).toBe(504);
    expect(await response.text()).toBe('');
    expect(sink.warn).not.toHaveBeenCalled();
  });

  it('should report validation errors as usual', async () => {
    const url = await start({sink: createSink(), resolveHost: host(60 * 1000)});

    const response = await fetch(`${url}/api/reports?rows=-1`);

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({error: 'rows and stepMs must be non-negative numbers'});
  });
});
