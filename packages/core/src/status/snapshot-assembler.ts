/**
 * Snapshot Assembler - one consistent status view of an environment
 *
 * Fetches machines, instances and services once, builds the instance index,
 * resolves every machine and then every service (units are checked against
 * the resolved machines), and merges both into a StatusSnapshot. Any fatal
 * condition rejects the whole run and aborts the entities still resolving;
 * no partial snapshot is ever returned.
 *
 * @example
 * ```typescript
 * const assembler = new StatusAssembler(environment, { maxWorkers: 4 });
 * assembler.on('machineResolved', (status) => console.error(status.id));
 * const snapshot = await assembler.assemble();
 * ```
 */

import { EventEmitter } from 'node:events';

import { collaborate, throwIfCancelled } from './errors.js';
import { buildInstanceIndex } from './instance-index.js';
import { resolveMachineStatus } from './machine-status.js';
import { resolveServiceStatus } from './service-status.js';
import { WorkerPool } from './worker-pool.js';

import type {
  Environment,
  Instance,
  Machine,
  Service,
} from '../types/collaborators.js';
import type { MachineStatus, ServiceStatus, StatusSnapshot } from '../types/status.js';

// ============================================================================
// Types
// ============================================================================

export interface StatusAssemblerOptions {
  /** Upper bound on concurrently resolved machines or services */
  maxWorkers?: number | undefined;
  /** Aborting stops new collaborator calls and rejects the run */
  signal?: AbortSignal | undefined;
}

/**
 * Collection sizes reported once all three fetches succeeded
 */
export interface FetchSummary {
  machines: number;
  instances: number;
  services: number;
}

/**
 * Events emitted during a run
 */
export interface StatusAssemblerEvents {
  fetched: (summary: FetchSummary) => void;
  machineResolved: (status: MachineStatus) => void;
  serviceResolved: (status: ServiceStatus) => void;
}

// ============================================================================
// Assembler
// ============================================================================

export class StatusAssembler extends EventEmitter {
  private readonly environment: Environment;
  private readonly options: StatusAssemblerOptions;

  constructor(environment: Environment, options: StatusAssemblerOptions = {}) {
    super();
    this.environment = environment;
    this.options = options;
  }

  override on<K extends keyof StatusAssemblerEvents>(
    event: K,
    listener: StatusAssemblerEvents[K]
  ): this {
    return super.on(event, listener);
  }

  override emit<K extends keyof StatusAssemblerEvents>(
    event: K,
    ...args: Parameters<StatusAssemblerEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }

  /**
   * Compute a fresh snapshot
   */
  async assemble(): Promise<StatusSnapshot> {
    const { store, provider, heartbeat } = this.environment;
    const { signal } = this.options;
    throwIfCancelled(signal);

    // All three start at once; they are unwrapped in this fixed order
    const instancesFetch = settle(
      collaborate('list instances', undefined, () => provider.allInstances(), signal)
    );
    const machinesFetch = settle(
      collaborate('list machines', undefined, () => store.allMachines(), signal)
    );
    const servicesFetch = settle(
      collaborate('list services', undefined, () => store.allServices(), signal)
    );
    const instances: Instance[] = unwrap(await instancesFetch);
    const machines: Machine[] = unwrap(await machinesFetch);
    const services: Service[] = unwrap(await servicesFetch);

    this.emit('fetched', {
      machines: machines.length,
      instances: instances.length,
      services: services.length,
    });

    const index = buildInstanceIndex(instances);

    const sortedMachines = [...machines].sort((a, b) => a.id() - b.id());
    const machineStatuses = await this.createPool<Machine, MachineStatus>().run(
      sortedMachines,
      async (machine, _index, runSignal) => {
        const status = await resolveMachineStatus(machine, {
          instances: index,
          heartbeat,
          signal: runSignal,
        });
        this.emit('machineResolved', status);
        return status;
      }
    );
    const machineMap = new Map(machineStatuses.map((status) => [status.id, status]));

    const sortedServices = [...services].sort((a, b) => compareStrings(a.name(), b.name()));
    const serviceStatuses = await this.createPool<Service, ServiceStatus>().run(
      sortedServices,
      async (service, _index, runSignal) => {
        const status = await resolveServiceStatus(service, {
          machines: machineMap,
          heartbeat,
          signal: runSignal,
        });
        this.emit('serviceResolved', status);
        return status;
      }
    );

    throwIfCancelled(signal);
    return {
      machines: machineMap,
      services: new Map(serviceStatuses.map((status) => [status.name, status])),
    };
  }

  private createPool<TInput, TOutput>(): WorkerPool<TInput, TOutput> {
    return new WorkerPool<TInput, TOutput>({
      maxWorkers: this.options.maxWorkers,
      signal: this.options.signal,
    });
  }
}

/**
 * Compute a snapshot with default options
 */
export async function getStatus(
  environment: Environment,
  options?: StatusAssemblerOptions
): Promise<StatusSnapshot> {
  return new StatusAssembler(environment, options).assemble();
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Turn a fetch into a promise that never rejects, so fetches left behind
 * after an earlier one failed do not go unhandled
 */
function settle<T>(promise: Promise<T>): Promise<PromiseSettledResult<T>> {
  return promise.then(
    (value): PromiseSettledResult<T> => ({ status: 'fulfilled', value }),
    (reason: unknown): PromiseSettledResult<T> => ({ status: 'rejected', reason })
  );
}

/**
 * Unwrap a settled fetch. Fetches are checked in a fixed order so the
 * reported error is the same whichever call fails first.
 */
function unwrap<T>(result: PromiseSettledResult<T>): T {
  if (result.status === 'rejected') {
    throw result.reason;
  }
  return result.value;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
