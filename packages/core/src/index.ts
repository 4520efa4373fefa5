/**
 * fleetstat-core
 *
 * Status aggregation for managed compute environments: machines, the
 * provider instances backing them, services and their units.
 */

export * from './types/index.js';
export * from './status/index.js';
export * from './config/index.js';
export * from './environment/index.js';
