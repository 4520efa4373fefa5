/**
 * Local Environment - collaborators backed by an in-memory state document
 *
 * Plays the store, the provider and the heartbeat subsystem for one
 * environment document. Records are built from the document on every
 * listing.
 */

import { parseToolsVersion } from '../status/agent-state.js';
import { NotFoundError } from '../status/errors.js';

import {
  environmentDocumentSchema,
  type EnvironmentDocument,
  type EnvironmentDocumentInput,
  type InstanceRecord,
  type MachineRecord,
  type ServiceRecord,
  type UnitRecord,
} from './document.js';

import type {
  AgentStatusReport,
  AgentTools,
  Charm,
  Environment,
  Heartbeat,
  Instance,
  Machine,
  OrchestrationStore,
  Provider,
  Service,
  Unit,
} from '../types/collaborators.js';

// ============================================================================
// Tags
// ============================================================================

export function machineTag(id: number): string {
  return `machine-${id}`;
}

export function unitTag(unitName: string): string {
  return `unit-${unitName.replace('/', '-')}`;
}

// ============================================================================
// Records
// ============================================================================

class LocalInstance implements Instance {
  constructor(private readonly record: InstanceRecord) {}

  id(): string {
    return this.record.id;
  }

  async dnsName(): Promise<string> {
    const dnsName = this.record['dns-name'];
    if (dnsName === undefined) {
      throw new Error(`instance ${this.record.id} has no DNS name yet`);
    }
    return dnsName;
  }
}

class LocalMachine implements Machine {
  constructor(private readonly record: MachineRecord) {}

  id(): number {
    return this.record.id;
  }

  tag(): string {
    return machineTag(this.record.id);
  }

  async instanceId(): Promise<string> {
    const instanceId = this.record['instance-id'];
    if (instanceId === undefined) {
      throw new NotFoundError(`instance id for machine ${this.record.id}`);
    }
    return instanceId;
  }

  async status(): Promise<AgentStatusReport | undefined> {
    return this.record.status;
  }

  async agentTools(): Promise<AgentTools | undefined> {
    const tools = this.record.tools;
    if (tools === undefined) {
      return undefined;
    }
    const result: AgentTools = { version: parseToolsVersion(tools.version) };
    if (tools.series !== undefined) {result.series = tools.series;}
    if (tools.arch !== undefined) {result.arch = tools.arch;}
    return result;
  }
}

class LocalCharm implements Charm {
  constructor(private readonly charmUrl: string) {}

  url(): string {
    return this.charmUrl;
  }
}

class LocalUnit implements Unit {
  private readonly unitName: string;

  constructor(
    serviceName: string,
    ordinal: number,
    private readonly record: UnitRecord
  ) {
    this.unitName = `${serviceName}/${ordinal}`;
  }

  name(): string {
    return this.unitName;
  }

  tag(): string {
    return unitTag(this.unitName);
  }

  async assignedMachineId(): Promise<number | undefined> {
    return this.record.machine;
  }

  async status(): Promise<AgentStatusReport | undefined> {
    return this.record.status;
  }
}

class LocalService implements Service {
  constructor(
    private readonly record: ServiceRecord,
    private readonly charms: ReadonlySet<string>
  ) {}

  name(): string {
    return this.record.name;
  }

  async charm(): Promise<Charm> {
    if (!this.charms.has(this.record.charm)) {
      throw new NotFoundError(`charm ${this.record.charm}`);
    }
    return new LocalCharm(this.record.charm);
  }

  async isExposed(): Promise<boolean> {
    return this.record.exposed;
  }

  async allUnits(): Promise<Unit[]> {
    return this.record.units.map((unit, ordinal) => new LocalUnit(this.record.name, ordinal, unit));
  }
}

// ============================================================================
// Environment
// ============================================================================

export class LocalEnvironment implements Environment {
  readonly name: string;
  readonly store: OrchestrationStore;
  readonly provider: Provider;
  readonly heartbeat: Heartbeat;

  constructor(name: string, private readonly document: EnvironmentDocument) {
    this.name = name;
    this.store = {
      allMachines: async () => this.document.machines.map((m) => new LocalMachine(m)),
      allServices: async () => {
        const charms = new Set(this.document.charms.map((c) => c.url));
        return this.document.services.map((s) => new LocalService(s, charms));
      },
    };
    this.provider = {
      allInstances: async () => this.document.instances.map((i) => new LocalInstance(i)),
    };
    this.heartbeat = {
      isAlive: async (tag) => this.aliveTags().has(tag),
    };
  }

  /**
   * Validate a raw document and wrap it
   */
  static fromDocument(name: string, input: EnvironmentDocumentInput): LocalEnvironment {
    return new LocalEnvironment(name, environmentDocumentSchema.parse(input));
  }

  private aliveTags(): Set<string> {
    const tags = new Set<string>();
    for (const machine of this.document.machines) {
      if (machine['agent-alive']) {
        tags.add(machineTag(machine.id));
      }
    }
    for (const service of this.document.services) {
      service.units.forEach((unit, ordinal) => {
        if (unit['agent-alive']) {
          tags.add(unitTag(`${service.name}/${ordinal}`));
        }
      });
    }
    return tags;
  }
}
