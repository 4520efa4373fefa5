/**
 * Configuration type definitions
 *
 * Configuration lives in .fleet/config.json under the project root.
 */

// ============================================================================
// Environment Configuration
// ============================================================================

/**
 * Environment backed by a local state document (JSON or YAML)
 */
export interface LocalEnvironmentConfig {
  type: 'local';
  /** Path to the state document, relative to the root directory */
  stateFile: string;
}

export type EnvironmentConfig = LocalEnvironmentConfig;

// ============================================================================
// Status Configuration
// ============================================================================

export type StatusFormat = 'yaml' | 'json';

export const STATUS_FORMATS: readonly StatusFormat[] = ['yaml', 'json'];

export interface StatusConfig {
  /** Default output format */
  format: StatusFormat;
  /** Upper bound on machines or services resolved in parallel */
  maxWorkers: number;
}

// ============================================================================
// Root
// ============================================================================

export interface FleetConfig {
  /** Environment used when none is selected explicitly */
  defaultEnvironment?: string | undefined;
  environments: Record<string, EnvironmentConfig>;
  status: StatusConfig;
}
