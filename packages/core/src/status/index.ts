/**
 * Status module exports
 *
 * Aggregation of store, provider and heartbeat data into one snapshot.
 */

export {
  StatusAssembler,
  getStatus,
  type StatusAssemblerOptions,
  type StatusAssemblerEvents,
  type FetchSummary,
} from './snapshot-assembler.js';
export { buildInstanceIndex, type InstanceIndex } from './instance-index.js';
export {
  resolveMachineStatus,
  readInstanceAssignment,
  type InstanceAssignment,
  type MachineResolverContext,
} from './machine-status.js';
export {
  resolveUnitStatus,
  compareUnitNames,
  unitOrdinal,
  type UnitResolverContext,
} from './unit-status.js';
export { resolveServiceStatus } from './service-status.js';
export {
  deriveAgentState,
  resolveAgentState,
  formatToolsVersion,
  parseToolsVersion,
} from './agent-state.js';
export {
  toStatusDocument,
  toMachineDocument,
  toServiceDocument,
  toUnitDocument,
  stringifyMachineKeys,
  parseMachineKeys,
  InvalidMachineKeyError,
} from './document.js';
export {
  WorkerPool,
  DEFAULT_MAX_WORKERS,
  type WorkerPoolOptions,
  type WorkerPoolStats,
  type WorkerPoolEvents,
  type TaskProcessor,
} from './worker-pool.js';
export {
  StatusError,
  NotFoundError,
  InstanceNotFoundError,
  UnknownMachineError,
  CollaboratorError,
  StatusCancelledError,
  isNotFoundError,
  collaborate,
  throwIfCancelled,
  toError,
} from './errors.js';
