import type {Logger, LoggerOptions} from 'pino';

import pino from 'pino';

export type {Logger} from 'pino';

/**
 * Pino logger emitting JSON to stdout.
 *
 * Level comes from `LOG_LEVEL`, service name from `SERVICE_NAME`.
 * Output is disabled under Vitest or `NODE_ENV=test`.
 */
export function makeLogger(bindings?: Record<string, unknown>, env: NodeJS.ProcessEnv = process.env): Logger {
  const isTestTooling = env.VITEST === 'true' || env.NODE_ENV === 'test';

  const options: LoggerOptions = {
    level: env.LOG_LEVEL ?? 'info',
    enabled: !isTestTooling,
    base: {...bindings, service: env.SERVICE_NAME ?? 'timeout-link'},
    messageKey: 'msg',
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return pino(options);
}

/**
 * For tests - pino with enabled:false (keeps the type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({enabled: false});
}
