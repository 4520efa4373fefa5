/**
 * Collaborator contracts
 *
 * The status engine only reads. Everything it knows about an environment
 * arrives through these three interfaces: the orchestration store, the
 * cloud provider and the heartbeat subsystem.
 */

// ============================================================================
// Agent Status Types
// ============================================================================

/**
 * Status codes an agent may report explicitly about itself
 */
export type AgentStatusCode = 'pending' | 'started' | 'stopped' | 'error';

/**
 * Array of all valid agent status codes
 */
export const AGENT_STATUS_CODES: readonly AgentStatusCode[] = [
  'pending',
  'started',
  'stopped',
  'error',
];

/**
 * Status explicitly reported by a machine or unit agent
 */
export interface AgentStatusReport {
  code: AgentStatusCode;
  /** Free-text detail; empty string when the agent gave none */
  info: string;
}

/**
 * Tool-version metadata recorded for a machine agent
 */
export interface AgentTools {
  version: ToolsVersion;
  series?: string;
  arch?: string;
}

/**
 * Numeric tool version
 */
export interface ToolsVersion {
  major: number;
  minor: number;
  patch: number;
  /** Build number, only shown when non-zero */
  build: number;
}

// ============================================================================
// Orchestration Store
// ============================================================================

/**
 * Anything that runs an agent and can be looked up in the heartbeat subsystem
 */
export interface AgentEntity {
  /** Heartbeat key, e.g. `machine-3` or `unit-wordpress-0` */
  tag(): string;
  /** Explicitly reported status, `undefined` if the agent never reported one */
  status(): Promise<AgentStatusReport | undefined>;
}

/**
 * Managed machine record
 */
export interface Machine extends AgentEntity {
  id(): number;
  /**
   * Provider instance backing this machine.
   *
   * Rejects with a `NotFoundError` while the machine is still waiting for
   * an instance; any other rejection is a real failure.
   */
  instanceId(): Promise<string>;
  /** Tool metadata, `undefined` when the agent has not recorded any */
  agentTools(): Promise<AgentTools | undefined>;
}

/**
 * Deployable artifact backing a service
 */
export interface Charm {
  /** Identity string, e.g. `local:series/dummy-1` */
  url(): string;
}

/**
 * One running instance of a service
 */
export interface Unit extends AgentEntity {
  /** `{service}/{ordinal}` */
  name(): string;
  /** Assigned machine id, `undefined` when unassigned */
  assignedMachineId(): Promise<number | undefined>;
}

/**
 * Named deployable application
 */
export interface Service {
  name(): string;
  charm(): Promise<Charm>;
  isExposed(): Promise<boolean>;
  allUnits(): Promise<Unit[]>;
}

/**
 * Persisted orchestration state
 */
export interface OrchestrationStore {
  allMachines(): Promise<Machine[]>;
  allServices(): Promise<Service[]>;
}

// ============================================================================
// Provider
// ============================================================================

/**
 * Provider-side compute resource
 */
export interface Instance {
  id(): string;
  /** May be a remote call */
  dnsName(): Promise<string>;
}

/**
 * Cloud provider inventory
 */
export interface Provider {
  allInstances(): Promise<Instance[]>;
}

// ============================================================================
// Heartbeat
// ============================================================================

/**
 * Agent liveness
 */
export interface Heartbeat {
  isAlive(tag: string): Promise<boolean>;
}

/**
 * The three collaborators of one environment
 */
export interface Environment {
  name: string;
  store: OrchestrationStore;
  provider: Provider;
  heartbeat: Heartbeat;
}
