import {ZodError, z} from 'zod';

import {DEFAULT_SAFETY_BUFFER_MS} from '../budget';

export interface ConfigValidationMeta {
  code: 'INVALID_CONFIG';
  invalid: string[];
}

export class ConfigError extends Error {
  readonly meta: ConfigValidationMeta;

  constructor(meta: ConfigValidationMeta) {
    super(`Invalid timeout-link config: ${JSON.stringify(meta)}`);
    this.name = 'ConfigError';
    this.meta = meta;
  }
}

const envSchema = z.object({
  // Slack subtracted from the Lambda remaining time, in milliseconds
  TIMEOUT_LINK_SAFETY_BUFFER_MS: z.coerce.number().int().nonnegative().default(DEFAULT_SAFETY_BUFFER_MS),
});

export type Config = {
  safetyBufferMs: number;
};

/**
 * Reads gate configuration from the environment.
 *
 * @throws {ConfigError} If a variable is present but invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    const parsed = envSchema.parse(env);

    return {safetyBufferMs: parsed.TIMEOUT_LINK_SAFETY_BUFFER_MS};
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError({
        code: 'INVALID_CONFIG',
        invalid: error.issues.map(issue => issue.path.join('.')),
      });
    }
    throw error;
  }
}
