/**
 * Unit Status Resolver
 */

import { resolveAgentState } from './agent-state.js';
import { UnknownMachineError, collaborate } from './errors.js';

import type { Heartbeat, Unit } from '../types/collaborators.js';
import type { MachineStatus, UnitStatus } from '../types/status.js';

export interface UnitResolverContext {
  /** Machines already resolved in this run */
  machines: ReadonlyMap<number, MachineStatus>;
  heartbeat: Heartbeat;
  /** Aborted when the run is cancelled or another entity failed */
  signal?: AbortSignal | undefined;
}

/**
 * Resolve the status of a single unit. A unit with nothing to report
 * still yields an entry carrying only its name.
 */
export async function resolveUnitStatus(
  unit: Unit,
  context: UnitResolverContext
): Promise<UnitStatus> {
  const name = unit.name();
  const label = `unit ${name}`;
  const result: UnitStatus = { name };

  const machineId = await collaborate(
    'get assigned machine',
    label,
    () => unit.assignedMachineId(),
    context.signal
  );
  if (machineId !== undefined) {
    if (!context.machines.has(machineId)) {
      throw new UnknownMachineError(name, machineId);
    }
    result.machineId = machineId;
  }

  const agent = await resolveAgentState(unit, context.heartbeat, label, context.signal);
  if (agent !== undefined) {
    result.agent = agent;
  }

  return result;
}

/**
 * Ordinal part of a `{service}/{ordinal}` unit name
 */
export function unitOrdinal(name: string): number {
  const slash = name.lastIndexOf('/');
  const ordinal = parseInt(name.slice(slash + 1), 10);
  return isNaN(ordinal) ? Number.MAX_SAFE_INTEGER : ordinal;
}

/**
 * Sort by ordinal so `svc/10` follows `svc/9`
 */
export function compareUnitNames(a: string, b: string): number {
  return unitOrdinal(a) - unitOrdinal(b) || (a < b ? -1 : a > b ? 1 : 0);
}
