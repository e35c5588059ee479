import type {DiagnosticSink, GateOptions, RequestScope, ResponseSink} from '../types';
import type {HostContext} from '../host';
import type {Application, NextFunction, RequestHandler, Response} from 'express';

import {defaults} from 'lodash-es';

import {ClientClosedError} from '../cancellation';
import {loadConfig} from '../config';
import {currentInvocation, LAMBDA_CONTEXT} from '../host';
import {makeLogger} from '../logger';
import {TimeoutLinkGate} from '../timeout-link';
import {fanout, telemetrySink} from '../with-telemetry';

declare global {
  namespace Express {
    interface Request {
      /**
       * Aborts when the request should stop: client disconnect, or the
       * Lambda deadline once `timeoutLink` is installed.
       */
      signal: AbortSignal;
    }
  }
}

export type TimeoutLinkOptions = GateOptions & {
  /**
   * Logger for cancellation warnings. A pino logger by default.
   */
  logger?: DiagnosticSink;
  /**
   * Replaces the default logger + span event sinks entirely.
   */
  sink?: DiagnosticSink;
  /**
   * Where `hostContext` looks up the Lambda context. The active invocation by default.
   */
  resolveHost?: () => HostContext | undefined;
};

type ExpressScope = RequestScope & {
  readonly res: Response;
  readonly next: NextFunction;
};

/**
 * Signal that aborts with `ClientClosedError` when the response closes
 * before it was fully sent.
 */
export function disconnectSignal(res: Response): AbortSignal {
  const controller = new AbortController();

  res.once('close', () => {
    if (!res.writableFinished) {
      controller.abort(new ClientClosedError());
    }
  });

  return controller.signal;
}

function responseSink(res: Response): ResponseSink {
  return {
    get hasStarted() {
      return res.headersSent;
    },
    terminate(status: number) {
      for (const name of res.getHeaderNames()) {
        res.removeHeader(name);
      }
      res.status(status).set('Content-Length', '0').end();
    },
  };
}

/**
 * Runs the rest of the Express chain as the gate's pipeline.
 *
 * Express does not report when downstream handlers are done, so the chain is
 * done once the response closes, and cancelled once the linked signal aborts.
 * Downstream errors are handled by Express error middleware as usual.
 */
function proceed(scope: ExpressScope): Promise<void> {
  const {res, signal} = scope;

  return new Promise<void>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }

    const onClose = () => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    };
    const onAbort = () => {
      res.off('close', onClose);
      reject(signal.reason);
    };

    res.once('close', onClose);
    signal.addEventListener('abort', onAbort, {once: true});

    scope.next();
  });
}

/**
 * Middleware that stores the Lambda context in `res.locals` for `timeoutLink`.
 */
export function hostContext(resolve: () => HostContext | undefined = currentInvocation): RequestHandler {
  return (_req, res, next) => {
    const context = resolve();
    if (context) {
      res.locals[LAMBDA_CONTEXT] = context;
    }

    next();
  };
}

/**
 * Middleware linking the Lambda deadline with `req.signal`.
 *
 * Install before anything that writes the response or reads `req.signal`.
 * Without an explicit `safetyBufferMs` the environment is read (see `loadConfig`).
 *
 * @throws {RangeError} If the safety buffer is negative
 * @throws {ConfigError} If the environment is read and holds an invalid value
 */
export function timeoutLink(options: TimeoutLinkOptions = {}): RequestHandler {
  const settings = defaults({}, options, options.safetyBufferMs === undefined ? loadConfig() : {});
  const sink = settings.sink ?? fanout(settings.logger ?? makeLogger({component: 'timeout-link'}), telemetrySink());
  const gate = new TimeoutLinkGate<ExpressScope>(proceed, sink, {safetyBufferMs: settings.safetyBufferMs});

  return (req, res, next) => {
    if (!(req.signal instanceof AbortSignal)) {
      req.signal = disconnectSignal(res);
    }

    const scope: ExpressScope = {
      path: req.path,
      get signal() {
        return req.signal;
      },
      set signal(value: AbortSignal) {
        req.signal = value;
      },
      items: res.locals,
      response: responseSink(res),
      res,
      next,
    };

    gate.invoke(scope).catch(next);
  };
}

/**
 * Installs `hostContext` and `timeoutLink` on the app.
 *
 * @example
 * ```typescript
 * const app = useTimeoutLink(express(), {safetyBufferMs: 500});
 * app.get('/report', async (req, res) => {
 *   res.json(await buildReport({signal: req.signal}));
 * });
 * ```
 */
export function useTimeoutLink<A extends Application>(app: A, options: TimeoutLinkOptions = {}): A {
  app.use(hostContext(options.resolveHost), timeoutLink(options));

  return app;
}
