/**
 * Status Document - serializable view of a snapshot
 *
 * A key is present only when its datum exists; nothing is emitted as null
 * or as an empty placeholder. Machine ids stay integers in the native
 * document and become decimal strings for string-keyed formats.
 */

import type {
  AgentStateReport,
  MachineDocument,
  MachineStatus,
  ServiceDocument,
  ServiceStatus,
  StatusDocument,
  StatusSnapshot,
  StringKeyedStatusDocument,
  UnitDocument,
  UnitStatus,
} from '../types/status.js';

// ============================================================================
// Snapshot to Document
// ============================================================================

export function toStatusDocument(snapshot: StatusSnapshot): StatusDocument {
  const machines = new Map<number, MachineDocument>();
  for (const [id, status] of snapshot.machines) {
    machines.set(id, toMachineDocument(status));
  }

  const services: Record<string, ServiceDocument> = {};
  for (const [name, status] of snapshot.services) {
    services[name] = toServiceDocument(status);
  }

  return { machines, services };
}

export function toMachineDocument(status: MachineStatus): MachineDocument {
  if (status.kind === 'pending') {
    return { 'instance-id': 'pending' };
  }

  const doc: MachineDocument = {
    'instance-id': status.instanceId,
    'dns-name': status.dnsName,
  };
  applyAgentState(doc, status.agent);
  if (status.agentVersion !== undefined) {
    doc['agent-version'] = status.agentVersion;
  }
  return doc;
}

export function toServiceDocument(status: ServiceStatus): ServiceDocument {
  const doc: ServiceDocument = {
    charm: status.charm,
    exposed: status.exposed,
  };
  if (status.units.size > 0) {
    const units: Record<string, UnitDocument> = {};
    for (const [name, unit] of status.units) {
      units[name] = toUnitDocument(unit);
    }
    doc.units = units;
  }
  return doc;
}

export function toUnitDocument(status: UnitStatus): UnitDocument {
  const doc: UnitDocument = {};
  if (status.machineId !== undefined) {
    doc.machine = String(status.machineId);
  }
  applyAgentState(doc, status.agent);
  return doc;
}

function applyAgentState(
  doc: Pick<MachineDocument, 'agent-state' | 'agent-state-info'>,
  agent: AgentStateReport | undefined
): void {
  if (agent === undefined) {
    return;
  }
  doc['agent-state'] = agent.state;
  if (agent.info !== undefined) {
    doc['agent-state-info'] = agent.info;
  }
}

// ============================================================================
// Key Normalization
// ============================================================================

/**
 * Error thrown when a string machine key is not a machine id
 */
export class InvalidMachineKeyError extends Error {
  constructor(public readonly key: string) {
    super(`invalid machine key "${key}"`);
    this.name = 'InvalidMachineKeyError';
  }
}

/**
 * Convert integer machine keys to their decimal string form
 */
export function stringifyMachineKeys(document: StatusDocument): StringKeyedStatusDocument {
  const machines: Record<string, MachineDocument> = {};
  for (const [id, machine] of document.machines) {
    machines[String(id)] = machine;
  }
  return { machines, services: document.services };
}

/**
 * Recover integer machine keys from a string-keyed document
 */
export function parseMachineKeys(document: StringKeyedStatusDocument): StatusDocument {
  const machines = new Map<number, MachineDocument>();
  const ids = Object.keys(document.machines).map((key) => [key, parseMachineKey(key)] as const);
  ids.sort(([, a], [, b]) => a - b);
  for (const [key, id] of ids) {
    const machine = document.machines[key];
    if (machine !== undefined) {
      machines.set(id, machine);
    }
  }
  return { machines, services: document.services };
}

function parseMachineKey(key: string): number {
  if (!/^(0|[1-9]\d*)$/.test(key)) {
    throw new InvalidMachineKeyError(key);
  }
  const id = Number(key);
  if (!Number.isSafeInteger(id)) {
    throw new InvalidMachineKeyError(key);
  }
  return id;
}
