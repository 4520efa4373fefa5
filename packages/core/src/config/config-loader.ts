/**
 * Config Loader - Configuration loading and merging
 *
 * Loads configuration from .fleet/config.json and merges with defaults.
 * Environment variables override file values; a missing file is not an
 * error.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { assertValidConfig } from './config-validator.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { STATUS_FORMATS } from './types.js';

import type { EnvironmentConfig, FleetConfig, StatusConfig, StatusFormat } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Directory name for fleet configuration */
export const FLEET_DIR = '.fleet';

/** Config file name */
const CONFIG_FILE = 'config.json';

/** Environment variable prefix for config overrides */
const ENV_PREFIX = 'FLEET_';

/** Environment variable names for specific config options */
export const ENV_VARS = {
  ENVIRONMENT: `${ENV_PREFIX}ENV`,
  STATUS_FORMAT: `${ENV_PREFIX}STATUS_FORMAT`,
  MAX_WORKERS: `${ENV_PREFIX}MAX_WORKERS`,
} as const;

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Error thrown when configuration loading fails
 */
export class ConfigLoadError extends Error {
  public readonly filePath: string;
  public readonly errorCause: Error | undefined;

  constructor(
    message: string,
    filePath: string,
    errorCause?: Error | undefined
  ) {
    super(message);
    this.name = 'ConfigLoadError';
    this.filePath = filePath;
    this.errorCause = errorCause;
  }
}

/**
 * Error thrown when configuration parsing fails
 */
export class ConfigParseError extends Error {
  public readonly filePath: string;
  public readonly errorCause: Error | undefined;

  constructor(
    message: string,
    filePath: string,
    errorCause?: Error | undefined
  ) {
    super(message);
    this.name = 'ConfigParseError';
    this.filePath = filePath;
    this.errorCause = errorCause;
  }
}

/**
 * Error thrown when no environment can be selected
 */
export class EnvironmentNotFoundError extends Error {
  constructor(
    message: string,
    public readonly requested: string | undefined
  ) {
    super(message);
    this.name = 'EnvironmentNotFoundError';
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a value is a plain object
 */
function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge plain-object values, with source values overriding target values
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }
    const targetValue = target[key];
    result[key] =
      isPlainObject(sourceValue) && isPlainObject(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

/**
 * Parse an integer from an environment variable string
 */
function parseEnvInteger(value: string | undefined): number | undefined {
  if (value === undefined) {return undefined;}
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

function isStatusFormat(value: string | undefined): value is StatusFormat {
  return STATUS_FORMATS.some((format) => format === value);
}

// ============================================================================
// Config Loader Class
// ============================================================================

export interface ConfigLoaderOptions {
  /** Root directory to search for .fleet/config.json */
  rootDir?: string | undefined;
  /** Whether to apply environment variable overrides */
  applyEnvOverrides?: boolean | undefined;
  /** Variables to read overrides from, defaults to process.env */
  env?: NodeJS.ProcessEnv | undefined;
}

export interface ConfigLoadResult {
  /** The loaded, merged and validated configuration */
  config: FleetConfig;
  /** Path to the config file (if found) */
  configPath?: string | undefined;
  configFileFound: boolean;
  envOverridesApplied: boolean;
}

/**
 * ConfigLoader - Loads and manages fleet configuration
 */
export class ConfigLoader {
  private readonly rootDir: string;
  private readonly applyEnvOverrides: boolean;
  private readonly env: NodeJS.ProcessEnv;
  private readonly configPath: string;
  private cachedConfig: FleetConfig | null = null;

  constructor(options: ConfigLoaderOptions = {}) {
    this.rootDir = options.rootDir ?? process.cwd();
    this.applyEnvOverrides = options.applyEnvOverrides ?? true;
    this.env = options.env ?? process.env;
    this.configPath = path.join(this.rootDir, FLEET_DIR, CONFIG_FILE);
  }

  // ==========================================================================
  // Public Methods
  // ==========================================================================

  /**
   * Load configuration from file, merge with defaults, apply env overrides
   * and validate the result
   */
  async load(): Promise<ConfigLoadResult> {
    let merged: Record<string, unknown> = { ...DEFAULT_CONFIG };
    let configFileFound = false;
    let envOverridesApplied = false;

    if (await fileExists(this.configPath)) {
      merged = deepMerge(merged, await this.loadFromFile(this.configPath));
      configFileFound = true;
    }

    if (this.applyEnvOverrides) {
      const overrides = this.getStatusEnvOverrides();
      if (Object.keys(overrides).length > 0) {
        merged = deepMerge(merged, { status: overrides });
        envOverridesApplied = true;
      }
    }

    const config = assertValidConfig(merged);
    this.cachedConfig = config;

    return {
      config,
      configPath: configFileFound ? this.configPath : undefined,
      configFileFound,
      envOverridesApplied,
    };
  }

  /**
   * Get the cached configuration, loading if necessary
   */
  async getConfig(): Promise<FleetConfig> {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }
    const result = await this.load();
    return result.config;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getRootDir(): string {
    return this.rootDir;
  }

  /**
   * Pick the environment to report on.
   *
   * Order: explicit name, FLEET_ENV, defaultEnvironment, the only
   * configured environment.
   */
  selectEnvironment(
    config: FleetConfig,
    requested?: string | undefined
  ): { name: string; environment: EnvironmentConfig } {
    const fromEnv = this.applyEnvOverrides ? this.env[ENV_VARS.ENVIRONMENT] : undefined;
    const names = Object.keys(config.environments);
    const name =
      requested ||
      fromEnv ||
      config.defaultEnvironment ||
      (names.length === 1 ? names[0] : undefined);

    if (name === undefined) {
      throw new EnvironmentNotFoundError(
        names.length === 0
          ? `no environments configured in ${this.configPath}`
          : `no environment selected; use --environment or ${ENV_VARS.ENVIRONMENT} (available: ${names.join(', ')})`,
        undefined
      );
    }

    const environment = Object.hasOwn(config.environments, name)
      ? config.environments[name]
      : undefined;
    if (environment === undefined) {
      throw new EnvironmentNotFoundError(`unknown environment "${name}"`, name);
    }
    return { name, environment };
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async loadFromFile(filePath: string): Promise<Record<string, unknown>> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new ConfigLoadError(
        `Failed to read configuration file: ${cause?.message ?? String(error)}`,
        filePath,
        cause
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new ConfigParseError(
        `Failed to parse configuration file: ${cause?.message ?? String(error)}`,
        filePath,
        cause
      );
    }

    if (!isPlainObject(parsed)) {
      throw new ConfigParseError('Configuration must be a JSON object', filePath);
    }
    return parsed;
  }

  private getStatusEnvOverrides(): Partial<StatusConfig> {
    const overrides: Partial<StatusConfig> = {};

    const format = this.env[ENV_VARS.STATUS_FORMAT];
    if (isStatusFormat(format)) {
      overrides.format = format;
    }

    const maxWorkers = parseEnvInteger(this.env[ENV_VARS.MAX_WORKERS]);
    if (maxWorkers !== undefined && maxWorkers > 0) {
      overrides.maxWorkers = maxWorkers;
    }

    return overrides;
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

/**
 * Load configuration with default options
 */
export async function loadConfig(rootDir?: string): Promise<FleetConfig> {
  const loader = new ConfigLoader({ rootDir });
  return loader.getConfig();
}
