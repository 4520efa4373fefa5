/**
 * Status snapshot types
 *
 * Resolved entities are tagged values. The serializable document with
 * kebab-case keys is derived from them in status/document.ts.
 */

import type { AgentStatusCode } from './collaborators.js';

/**
 * Derived agent state shown for a machine or unit
 *
 * - pending/started/stopped/error: what a live agent reported
 * - down: the agent reported something once but its heartbeat is gone
 */
export type AgentState = AgentStatusCode | 'down';

/**
 * Derived agent state with optional detail
 */
export interface AgentStateReport {
  state: AgentState;
  info?: string;
}

// ============================================================================
// Machines
// ============================================================================

/**
 * Machine with no instance assigned yet
 */
export interface PendingMachineStatus {
  kind: 'pending';
  id: number;
}

/**
 * Machine backed by a known provider instance
 */
export interface ProvisionedMachineStatus {
  kind: 'provisioned';
  id: number;
  instanceId: string;
  dnsName: string;
  /** Absent while no agent is known to exist */
  agent?: AgentStateReport;
  /** Dotted tools version */
  agentVersion?: string;
}

export type MachineStatus = PendingMachineStatus | ProvisionedMachineStatus;

// ============================================================================
// Services and Units
// ============================================================================

export interface UnitStatus {
  name: string;
  machineId?: number;
  agent?: AgentStateReport;
}

export interface ServiceStatus {
  name: string;
  charm: string;
  exposed: boolean;
  /** Keyed by unit name, in ordinal order */
  units: Map<string, UnitStatus>;
}

// ============================================================================
// Snapshot
// ============================================================================

/**
 * One complete, consistent view of an environment
 */
export interface StatusSnapshot {
  /** Ascending machine id */
  machines: Map<number, MachineStatus>;
  /** Ascending service name */
  services: Map<string, ServiceStatus>;
}

// ============================================================================
// Serializable Document
// ============================================================================

export interface MachineDocument {
  'instance-id': string;
  'dns-name'?: string;
  'agent-state'?: AgentState;
  'agent-state-info'?: string;
  'agent-version'?: string;
}

export interface UnitDocument {
  machine?: string;
  'agent-state'?: AgentState;
  'agent-state-info'?: string;
}

export interface ServiceDocument {
  charm: string;
  exposed: boolean;
  units?: Record<string, UnitDocument>;
}

/**
 * Document for formats that accept integer keys (YAML)
 */
export interface StatusDocument {
  machines: Map<number, MachineDocument>;
  services: Record<string, ServiceDocument>;
}

/**
 * Document for formats that only accept string keys (JSON)
 */
export interface StringKeyedStatusDocument {
  machines: Record<string, MachineDocument>;
  services: Record<string, ServiceDocument>;
}
