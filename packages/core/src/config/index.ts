/**
 * Config module exports
 */

export * from './types.js';
export { DEFAULT_CONFIG } from './defaults.js';
export {
  ConfigLoader,
  ConfigLoadError,
  ConfigParseError,
  EnvironmentNotFoundError,
  loadConfig,
  ENV_VARS,
  FLEET_DIR,
  type ConfigLoaderOptions,
  type ConfigLoadResult,
} from './config-loader.js';
export {
  validateConfig,
  assertValidConfig,
  ConfigValidationException,
  type ConfigValidationError,
  type ConfigValidationResult,
} from './config-validator.js';
