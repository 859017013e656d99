/**
 * Unified Application Configuration
 *
 * This module is the canonical source of truth for configuration. It parses
 * environment variables, validates them with Zod, and exports a frozen
 * config object that all server code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 *
 * Usage:
 *   import { config } from './config';
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import {
  NodeEnvSchema,
  LogLevelSchema,
  LogFormatSchema,
  getEffectiveNodeEnv,
  isProductionLike,
  loadEnvOrExit,
  type RawEnv,
} from './env';

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  app: z.object({
    serviceName: z.string().min(1),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
});

/**
 * Application configuration type inferred from the schema.
 */
export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Assemble the typed config from an already-validated environment.
 *
 * Defaults: `debug` logging in development, `error` under tests, `info`
 * elsewhere; JSON output in production-like environments, pretty output
 * otherwise.
 */
export function buildConfig(env: RawEnv): AppConfig {
  const nodeEnv = getEffectiveNodeEnv(env);
  const defaultLevel =
    nodeEnv === 'test' ? 'error' : nodeEnv === 'development' ? 'debug' : 'info';

  return ConfigSchema.parse({
    nodeEnv,
    app: {
      serviceName: env.ENGINE_SERVICE_NAME,
    },
    logging: {
      level: env.LOG_LEVEL ?? defaultLevel,
      format: env.LOG_FORMAT ?? (isProductionLike(nodeEnv) ? 'json' : 'pretty'),
      file: env.LOG_FILE,
    },
  });
}

// Load .env into process.env before we read anything from it.
// Skip in test mode so that .env cannot override test-specific settings.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

// Parse and freeze the final config so downstream code gets a fully
// validated, immutable view.
export const config: AppConfig = Object.freeze(buildConfig(loadEnvOrExit()));
