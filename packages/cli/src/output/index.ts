/**
 * Output format registration: yaml and json.
 */

import { formatJson } from './json.js';
import { formatYaml } from './yaml.js';

import type { StatusDocument, StatusFormat } from 'fleetstat-core';

/**
 * Format a status document in the requested format
 */
export function formatStatus(document: StatusDocument, format: StatusFormat): string {
  switch (format) {
    case 'json':
      return formatJson(document);
    case 'yaml':
    default:
      return formatYaml(document);
  }
}

export { formatJson } from './json.js';
export { formatYaml } from './yaml.js';
