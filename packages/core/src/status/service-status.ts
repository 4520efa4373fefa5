/**
 * Service Status Resolver
 *
 * Charm identity, exposure flag and the nested unit statuses of one service.
 */

import { collaborate } from './errors.js';
import { compareUnitNames, resolveUnitStatus } from './unit-status.js';

import type { UnitResolverContext } from './unit-status.js';
import type { Service } from '../types/collaborators.js';
import type { ServiceStatus, UnitStatus } from '../types/status.js';

/**
 * Resolve the status of a single service and all of its units
 */
export async function resolveServiceStatus(
  service: Service,
  context: UnitResolverContext
): Promise<ServiceStatus> {
  const name = service.name();
  const label = `service ${name}`;
  const { signal } = context;

  const charm = await collaborate('get charm', label, () => service.charm(), signal);
  const exposed = await collaborate('get exposure', label, () => service.isExposed(), signal);
  const units = await collaborate('list units', label, () => service.allUnits(), signal);

  const statuses: UnitStatus[] = [];
  for (const unit of units) {
    statuses.push(await resolveUnitStatus(unit, context));
  }
  statuses.sort((a, b) => compareUnitNames(a.name, b.name));

  return {
    name,
    charm: charm.url(),
    exposed,
    units: new Map(statuses.map((status) => [status.name, status])),
  };
}
