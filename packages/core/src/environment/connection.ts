/**
 * Environment connection - open a configured environment
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { parse as parseYaml } from 'yaml';

import { environmentDocumentSchema } from './document.js';
import { LocalEnvironment } from './local-environment.js';

import type { EnvironmentConfig } from '../config/types.js';

/**
 * Error thrown when a state document cannot be read or is invalid
 */
export class EnvironmentDocumentError extends Error {
  public readonly filePath: string;
  public readonly issues: string[];
  public readonly errorCause: Error | undefined;

  constructor(message: string, filePath: string, issues: string[] = [], errorCause?: Error) {
    super(message);
    this.name = 'EnvironmentDocumentError';
    this.filePath = filePath;
    this.issues = issues;
    this.errorCause = errorCause;
  }
}

/**
 * Open the environment described by a config entry.
 *
 * `.yaml`/`.yml` documents are parsed as YAML, everything else as JSON.
 */
export async function openEnvironment(
  name: string,
  config: EnvironmentConfig,
  rootDir: string
): Promise<LocalEnvironment> {
  const filePath = path.resolve(rootDir, config.stateFile);

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new EnvironmentDocumentError(
      `cannot read state for environment "${name}": ${cause?.message ?? String(error)}`,
      filePath,
      [],
      cause
    );
  }

  let raw: unknown;
  try {
    raw = isYamlFile(filePath) ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new EnvironmentDocumentError(
      `cannot parse state for environment "${name}": ${cause?.message ?? String(error)}`,
      filePath,
      [],
      cause
    );
  }

  const parsed = environmentDocumentSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new EnvironmentDocumentError(
      `invalid state for environment "${name}" in ${filePath}`,
      filePath,
      issues
    );
  }

  return new LocalEnvironment(name, parsed.data);
}

function isYamlFile(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return ext === '.yaml' || ext === '.yml';
}
