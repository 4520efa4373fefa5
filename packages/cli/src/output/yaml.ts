/**
 * YAML output format - machine ids stay integer keys.
 */

import { stringify } from 'yaml';

import type { StatusDocument } from 'fleetstat-core';

export function formatYaml(document: StatusDocument): string {
  return stringify(document);
}
