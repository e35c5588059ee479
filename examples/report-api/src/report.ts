import {setTimeout as sleep} from 'node:timers/promises';

import {throwIfCancelled} from '../../../src';

export type Report = {
  rows: number;
  checksum: number;
};

export type ReportProps = {
  rows: number;
  stepMs: number;
  signal: AbortSignal;
};

/**
 * Builds a report row by row, pausing `stepMs` between rows.
 * Stops with the signal's reason as soon as `signal` aborts.
 */
export async function buildReport({rows, stepMs, signal}: ReportProps): Promise<Report> {
  let checksum = 0;

  for (let row = 1; row <= rows; row++) {
    throwIfCancelled(signal);
    await sleep(stepMs, undefined, {signal});
    checksum += row;
  }

  return {rows, checksum};
}
