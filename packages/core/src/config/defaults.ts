import type { FleetConfig } from './types.js';

export const DEFAULT_CONFIG: FleetConfig = {
  environments: {},
  status: {
    format: 'yaml',
    maxWorkers: 8,
  },
};
