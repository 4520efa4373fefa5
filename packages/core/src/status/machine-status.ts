/**
 * Machine Status Resolver
 *
 * Joins one machine record against the instance index and derives its
 * agent state. A machine still waiting for an instance resolves to a
 * pending entry; a machine pointing at an instance the provider does not
 * have aborts the run.
 */

import { formatToolsVersion, resolveAgentState } from './agent-state.js';
import {
  CollaboratorError,
  InstanceNotFoundError,
  collaborate,
  isNotFoundError,
  throwIfCancelled,
  toError,
} from './errors.js';

import type { InstanceIndex } from './instance-index.js';
import type { Heartbeat, Machine } from '../types/collaborators.js';
import type { MachineStatus, ProvisionedMachineStatus } from '../types/status.js';

// ============================================================================
// Instance Assignment
// ============================================================================

/**
 * Outcome of reading a machine's instance id
 */
export type InstanceAssignment =
  | { kind: 'pending' }
  | { kind: 'assigned'; instanceId: string }
  | { kind: 'failed'; cause: Error };

/**
 * Read the instance id once and classify the result
 */
export async function readInstanceAssignment(
  machine: Machine,
  signal?: AbortSignal | undefined
): Promise<InstanceAssignment> {
  throwIfCancelled(signal);
  try {
    return { kind: 'assigned', instanceId: await machine.instanceId() };
  } catch (error) {
    if (isNotFoundError(error)) {
      return { kind: 'pending' };
    }
    return { kind: 'failed', cause: toError(error) };
  }
}

// ============================================================================
// Resolver
// ============================================================================

export interface MachineResolverContext {
  instances: InstanceIndex;
  heartbeat: Heartbeat;
  /** Aborted when the run is cancelled or another entity failed */
  signal?: AbortSignal | undefined;
}

/**
 * Resolve the status of a single machine
 */
export async function resolveMachineStatus(
  machine: Machine,
  context: MachineResolverContext
): Promise<MachineStatus> {
  const id = machine.id();
  const label = `machine ${id}`;
  const { signal } = context;
  const assignment = await readInstanceAssignment(machine, signal);

  switch (assignment.kind) {
    case 'pending':
      return { kind: 'pending', id };
    case 'failed':
      throw new CollaboratorError('get instance id', label, assignment.cause);
    case 'assigned':
      break;
  }

  const instance = context.instances.get(assignment.instanceId);
  if (instance === undefined) {
    throw new InstanceNotFoundError(id, assignment.instanceId);
  }

  const dnsName = await collaborate(
    'get DNS name',
    `instance ${assignment.instanceId}`,
    () => instance.dnsName(),
    signal
  );

  const result: ProvisionedMachineStatus = {
    kind: 'provisioned',
    id,
    instanceId: instance.id(),
    dnsName,
  };

  const agent = await resolveAgentState(machine, context.heartbeat, label, signal);
  if (agent !== undefined) {
    result.agent = agent;
  }

  const tools = await collaborate('get agent tools', label, () => machine.agentTools(), signal);
  if (tools !== undefined) {
    result.agentVersion = formatToolsVersion(tools.version);
  }

  return result;
}
