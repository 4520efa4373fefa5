/**
 * Instance Index - provider instances keyed by instance id
 */

import type { Instance } from '../types/collaborators.js';

export type InstanceIndex = ReadonlyMap<string, Instance>;

/**
 * Index instances by id. A duplicate id keeps the later instance.
 */
export function buildInstanceIndex(instances: readonly Instance[]): InstanceIndex {
  const index = new Map<string, Instance>();
  for (const instance of instances) {
    index.set(instance.id(), instance);
  }
  return index;
}
