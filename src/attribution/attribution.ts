import type {Cause} from '../types';

/**
 * Non-standard status used by proxies (e.g. nginx) when the client closed the connection.
 */
export const CLIENT_CLOSED_REQUEST = 499;

export const GATEWAY_TIMEOUT = 504;

type Entry = {cause: Cause; at: number};

/**
 * Records which trigger cancelled a request.
 *
 * A single cell is written by whichever trigger fires first; later triggers
 * are only noted as fired and never replace the winner.
 */
export class Attribution {
  private _winner: Entry | undefined;

  private _fired = new Set<Cause>();

  get cause() {
    return this._winner?.cause;
  }

  /**
   * Epoch milliseconds at which the winning cause was recorded.
   */
  get at() {
    return this._winner?.at;
  }

  /**
   * @returns True if this call set the winning cause
   */
  record(cause: Cause, at = Date.now()): boolean {
    this._fired.add(cause);

    if (this._winner) {
      return false;
    }

    this._winner = {cause, at};
    return true;
  }

  fired(cause: Cause): boolean {
    return this._fired.has(cause);
  }

  /**
   * Cause to report. Falls back to `deadline` when nothing was recorded.
   */
  decide(): Cause {
    return this._winner?.cause ?? 'deadline';
  }
}

export function statusFor(cause: Cause): number {
  return cause === 'disconnect' ? CLIENT_CLOSED_REQUEST : GATEWAY_TIMEOUT;
}
