/**
 * Configuration Module - Canonical Entry Point
 *
 * All server code should import configuration from this module:
 *
 *   import { config } from './config';
 *
 * Architecture:
 * - `env.ts` - Raw environment variable schema definitions
 * - `unified.ts` - Config assembly and validation logic
 * - `index.ts` (this file) - Canonical re-export point
 */

// ============================================================================
// Primary Configuration Export
// ============================================================================

export { config, buildConfig } from './unified';
export type { AppConfig } from './unified';

// ============================================================================
// Environment Schema & Utilities
// ============================================================================

export {
  EnvSchema,
  NodeEnvSchema,
  LogLevelSchema,
  LogFormatSchema,
  parseEnv,
  loadEnvOrExit,
  getEffectiveNodeEnv,
  isProductionLike,
} from './env';

export type { RawEnv, EnvValidationResult, NodeEnv, LogLevel, LogFormat } from './env';
