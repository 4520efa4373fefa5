/**
 * fleet CLI - program definition
 */

import { Command } from 'commander';

import { registerStatusCommand } from './commands/status.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('fleet')
    .description('Inspect managed compute environments')
    .version(VERSION);

  registerStatusCommand(program);

  return program;
}

export { statusAction, registerStatusCommand, type StatusOptions } from './commands/status.js';
export { formatStatus, formatJson, formatYaml } from './output/index.js';
