/**
 * Config Validator - Configuration validation
 *
 * Validates merged configuration objects and reports every problem with
 * its path, the expected shape and the value that was found.
 */

import { z } from 'zod';

import { STATUS_FORMATS } from './types.js';

import type { FleetConfig } from './types.js';

// ============================================================================
// Schema
// ============================================================================

const environmentSchema = z
  .object({
    type: z.literal('local'),
    stateFile: z.string().min(1),
  })
  .strict();

const statusSchema = z
  .object({
    format: z.enum(['yaml', 'json']),
    maxWorkers: z.number().int().min(1),
  })
  .strict();

const configSchema = z
  .object({
    defaultEnvironment: z.string().min(1).optional(),
    environments: z.record(environmentSchema),
    status: statusSchema,
  })
  .strict();

/** Expected-value hints shown next to errors, by top-level section */
const EXPECTED: Record<string, string> = {
  defaultEnvironment: 'name of a configured environment',
  environments: '{ "<name>": { "type": "local", "stateFile": "<path>" } }',
  status: `{ "format": ${STATUS_FORMATS.map((f) => `"${f}"`).join(' | ')}, "maxWorkers": integer >= 1 }`,
};

// ============================================================================
// Validation Error Types
// ============================================================================

/**
 * Represents a single configuration validation error
 */
export interface ConfigValidationError {
  /** Path to the invalid field (e.g., 'status.maxWorkers') */
  path: string;
  message: string;
  expected?: string;
  actual?: unknown;
}

export type ConfigValidationResult =
  | { valid: true; data: FleetConfig }
  | { valid: false; errors: ConfigValidationError[] };

/**
 * Custom error class for configuration validation failures
 */
export class ConfigValidationException extends Error {
  constructor(
    message: string,
    public readonly errors: ConfigValidationError[]
  ) {
    super(message);
    this.name = 'ConfigValidationException';
  }

  /**
   * Format errors as a human-readable string
   */
  formatErrors(): string {
    if (this.errors.length === 0) {return 'No errors';}

    return this.errors
      .map((e) => {
        let msg = `  - ${e.path || '(root)'}: ${e.message}`;
        if (e.expected) {msg += `\n    Expected: ${e.expected}`;}
        if (e.actual !== undefined) {msg += `\n    Got: ${JSON.stringify(e.actual)}`;}
        return msg;
      })
      .join('\n\n');
  }
}

// ============================================================================
// Validators
// ============================================================================

/**
 * Validate a complete (merged) configuration
 */
export function validateConfig(data: unknown): ConfigValidationResult {
  const parsed = configSchema.safeParse(data);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map((issue) => toValidationError(issue, data)),
    };
  }

  const config = parsed.data;
  if (
    config.defaultEnvironment !== undefined &&
    !Object.hasOwn(config.environments, config.defaultEnvironment)
  ) {
    return {
      valid: false,
      errors: [
        {
          path: 'defaultEnvironment',
          message: `Unknown environment "${config.defaultEnvironment}"`,
          expected: Object.keys(config.environments).join(' | ') || 'a configured environment',
          actual: config.defaultEnvironment,
        },
      ],
    };
  }

  return { valid: true, data: config };
}

/**
 * Validate a configuration and throw if invalid
 */
export function assertValidConfig(data: unknown): FleetConfig {
  const result = validateConfig(data);
  if (!result.valid) {
    throw new ConfigValidationException(
      `Invalid configuration: ${result.errors.length} validation error(s)`,
      result.errors
    );
  }
  return result.data;
}

// ============================================================================
// Helpers
// ============================================================================

function toValidationError(issue: z.ZodIssue, data: unknown): ConfigValidationError {
  const path = issue.path.join('.');
  const section = typeof issue.path[0] === 'string' ? issue.path[0] : '';
  const error: ConfigValidationError = { path, message: issue.message };
  const expected = EXPECTED[section];
  if (expected !== undefined) {
    error.expected = expected;
  }
  const actual = valueAt(data, issue.path);
  if (actual !== undefined) {
    error.actual = actual;
  }
  return error;
}

function valueAt(data: unknown, path: ReadonlyArray<string | number>): unknown {
  let current = data;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}
