/**
 * Status Command - fleet status
 *
 * Report machines, the instances backing them, services and units of an
 * environment as one YAML or JSON document.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { InvalidArgumentError, Option, type Command } from 'commander';
import {
  ConfigLoader,
  ConfigValidationException,
  EnvironmentDocumentError,
  StatusAssembler,
  openEnvironment,
  toStatusDocument,
  type FetchSummary,
  type MachineStatus,
  type ServiceStatus,
  type StatusFormat,
} from 'fleetstat-core';

import { formatStatus } from '../output/index.js';
import { createSpinner, status } from '../ui/spinner.js';

export interface StatusOptions {
  /** Environment to report on */
  environment?: string;
  /** Output format, defaults to the configured one */
  format?: StatusFormat;
  /** Write the document to this file instead of stdout */
  output?: string;
  /** Concurrency bound for resolving machines and services */
  workers?: number;
  /** Log progress to stderr */
  verbose?: boolean;
  /** Directory holding .fleet/ */
  root?: string;
}

/**
 * Status command implementation. Resolves with the process exit code.
 */
export async function statusAction(options: StatusOptions, signal?: AbortSignal): Promise<number> {
  const rootDir = path.resolve(options.root ?? process.cwd());
  const verbose = options.verbose ?? false;
  const spinner = options.output ? createSpinner('Collecting status...') : null;

  try {
    const loader = new ConfigLoader({ rootDir });
    const config = await loader.getConfig();
    const selected = loader.selectEnvironment(config, options.environment);
    const format = options.format ?? config.status.format;

    if (verbose) {
      status.info(`environment ${selected.name} (${selected.environment.stateFile})`);
    }

    const environment = await openEnvironment(selected.name, selected.environment, rootDir);
    const assembler = new StatusAssembler(environment, {
      maxWorkers: options.workers ?? config.status.maxWorkers,
      signal,
    });
    if (verbose) {
      attachProgressLogging(assembler);
    }

    spinner?.start();
    const snapshot = await assembler.assemble();
    const text = formatStatus(toStatusDocument(snapshot), format);

    if (options.output) {
      const outputPath = path.resolve(options.output);
      await fs.writeFile(outputPath, text, 'utf-8');
      spinner?.succeed(`Status written to ${outputPath}`);
    } else {
      process.stdout.write(text);
      if (verbose) {
        status.success(`status of ${selected.name} collected`);
      }
    }
    return 0;
  } catch (error) {
    spinner?.fail('Status failed');
    reportError(error);
    return 1;
  }
}

function attachProgressLogging(assembler: StatusAssembler): void {
  assembler.on('fetched', (summary: FetchSummary) => {
    status.info(
      `fetched ${summary.machines} machine(s), ${summary.instances} instance(s), ${summary.services} service(s)`
    );
  });
  assembler.on('machineResolved', (machine: MachineStatus) => {
    const state = machine.kind === 'pending' ? 'pending' : machine.agent?.state ?? 'no agent';
    status.info(`machine ${machine.id}: ${state}`);
  });
  assembler.on('serviceResolved', (service: ServiceStatus) => {
    status.info(`service ${service.name}: ${service.units.size} unit(s)`);
  });
}

function reportError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`error: ${message}\n`);

  if (error instanceof ConfigValidationException) {
    process.stderr.write(`${error.formatErrors()}\n`);
  } else if (error instanceof EnvironmentDocumentError) {
    for (const issue of error.issues) {
      process.stderr.write(`  - ${issue}\n`);
    }
  }
}

function parseWorkers(value: string): number {
  const workers = Number(value);
  if (!Number.isInteger(workers) || workers < 1) {
    throw new InvalidArgumentError('expected a positive integer');
  }
  return workers;
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Output status information about an environment')
    .option('-e, --environment <name>', 'Environment to report on')
    .addOption(
      new Option('--format <format>', 'Output format').choices(['yaml', 'json'])
    )
    .option('-o, --output <file>', 'Write the status document to a file')
    .option('-w, --workers <n>', 'Resolve up to n machines or services in parallel', parseWorkers)
    .option('-v, --verbose', 'Log progress to stderr')
    .option('--root <dir>', 'Directory containing .fleet/ (defaults to cwd)')
    .action(async (opts: StatusOptions) => {
      const controller = new AbortController();
      const onInterrupt = (): void => controller.abort();
      process.once('SIGINT', onInterrupt);
      try {
        process.exitCode = await statusAction(opts, controller.signal);
      } finally {
        process.off('SIGINT', onInterrupt);
      }
    });
}
