/**
 * JSON output format. Object keys must be strings, so machine ids are
 * written as their decimal form.
 */

import { stringifyMachineKeys, type StatusDocument } from 'fleetstat-core';

export function formatJson(document: StatusDocument): string {
  return JSON.stringify(stringifyMachineKeys(document), null, 2) + '\n';
}
