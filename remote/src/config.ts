/**
 * Remote channel configuration from environment variables
 */

import { z } from 'zod';
import { validate } from '@cuedeck/engine';
import type { RemoteConfig } from './types/index.js';

export const DEFAULT_REMOTE_HOST = 'localhost';
export const DEFAULT_REMOTE_PORT = 5556;

export const RemoteEnvSchema = z.object({
  CUEDECK_REMOTE_HOST: z.string().min(1).default(DEFAULT_REMOTE_HOST),
  CUEDECK_REMOTE_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_REMOTE_PORT),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

/**
 * @throws ValidationError naming the offending variable
 */
export function loadRemoteConfig(env: NodeJS.ProcessEnv = process.env): RemoteConfig {
  const parsed = validate(RemoteEnvSchema, env, 'remote environment');

  return {
    host: parsed.CUEDECK_REMOTE_HOST,
    port: parsed.CUEDECK_REMOTE_PORT,
    logLevel: parsed.LOG_LEVEL,
  };
}
