/**
 * Agent State - combine liveness and reported status into one keyword
 *
 * Precedence:
 *
 * | alive | reported status | agent-state        | agent-state-info         |
 * |-------|-----------------|--------------------|--------------------------|
 * | yes   | none            | started            | -                        |
 * | yes   | code, info      | code               | info (when non-empty)    |
 * | no    | code, info      | down               | "code" or "code: info"   |
 * | no    | none            | -                  | -                        |
 */

import { collaborate } from './errors.js';

import type {
  AgentEntity,
  AgentStatusReport,
  Heartbeat,
  ToolsVersion,
} from '../types/collaborators.js';
import type { AgentStateReport } from '../types/status.js';

/**
 * Pure derivation from the two signals
 */
export function deriveAgentState(
  alive: boolean,
  reported: AgentStatusReport | undefined
): AgentStateReport | undefined {
  if (alive) {
    if (reported === undefined) {
      return { state: 'started' };
    }
    return reported.info !== ''
      ? { state: reported.code, info: reported.info }
      : { state: reported.code };
  }

  if (reported === undefined) {
    return undefined;
  }

  return {
    state: 'down',
    info: reported.info !== '' ? `${reported.code}: ${reported.info}` : reported.code,
  };
}

/**
 * Read both signals for an entity and derive its agent state
 */
export async function resolveAgentState(
  entity: AgentEntity,
  heartbeat: Heartbeat,
  label: string,
  signal?: AbortSignal | undefined
): Promise<AgentStateReport | undefined> {
  const tag = entity.tag();
  const alive = await collaborate(
    'check agent liveness',
    label,
    () => heartbeat.isAlive(tag),
    signal
  );
  const reported = await collaborate('get agent status', label, () => entity.status(), signal);
  return deriveAgentState(alive, reported);
}

/**
 * Dotted version string; the build number only appears when non-zero
 */
export function formatToolsVersion(version: ToolsVersion): string {
  const base = `${version.major}.${version.minor}.${version.patch}`;
  return version.build > 0 ? `${base}.${version.build}` : base;
}

/**
 * Parse `major.minor.patch[.build]`, ignoring a `-series-arch` suffix
 */
export function parseToolsVersion(text: string): ToolsVersion {
  const [numbers = ''] = text.split('-');
  const match = /^(\d+)\.(\d+)\.(\d+)(?:\.(\d+))?$/.exec(numbers);
  if (!match) {
    throw new Error(`invalid version "${text}"`);
  }
  return {
    major: parseInt(match[1] ?? '0', 10),
    minor: parseInt(match[2] ?? '0', 10),
    patch: parseInt(match[3] ?? '0', 10),
    build: parseInt(match[4] ?? '0', 10),
  };
}
