/**
 * Status Command Tests
 *
 * Runs the status action against state documents in a temporary
 * directory and checks what reaches stdout, stderr and output files.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';

import { createProgram } from '../src/index.js';
import { statusAction } from '../src/commands/status.js';
import { formatJson, formatYaml } from '../src/output/index.js';

import type { StatusDocument } from 'fleetstat-core';

// =============================================================================
// Test Helpers
// =============================================================================

let rootDir: string;
let stdoutWrite: MockInstance;
let stderrWrite: MockInstance;

async function setupEnvironment(stateFile: string, state: string): Promise<void> {
  await fs.mkdir(path.join(rootDir, '.fleet'), { recursive: true });
  await fs.writeFile(
    path.join(rootDir, '.fleet', 'config.json'),
    JSON.stringify({ environments: { dev: { type: 'local', stateFile } } })
  );
  await fs.writeFile(path.join(rootDir, stateFile), state);
}

function written(spy: MockInstance): string {
  return spy.mock.calls.map((call) => String(call[0])).join('');
}

beforeEach(async () => {
  rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fleet-cli-'));
  stdoutWrite = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  stderrWrite = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(rootDir, { recursive: true, force: true });
});

// =============================================================================
// Program
// =============================================================================

describe('createProgram', () => {
  it('registers the status command with its options', () => {
    const program = createProgram();
    const statusCommand = program.commands.find((command) => command.name() === 'status');

    expect(statusCommand).toBeDefined();
    expect(statusCommand?.options.map((option) => option.long)).toEqual([
      '--environment',
      '--format',
      '--output',
      '--workers',
      '--verbose',
      '--root',
    ]);
  });
});

// =============================================================================
// statusAction
// =============================================================================

describe('statusAction', () => {
  it('writes YAML with integer machine keys to stdout', async () => {
    await setupEnvironment('dev.yaml', 'machines:\n  - id: 0\n');

    const code = await statusAction({ root: rootDir });

    expect(code).toBe(0);
    expect(written(stdoutWrite)).toBe('machines:\n  0:\n    instance-id: pending\nservices: {}\n');
  });

  it('writes JSON with string machine keys', async () => {
    await setupEnvironment('dev.json', JSON.stringify({ machines: [{ id: 0 }, { id: 4 }] }));

    const code = await statusAction({ root: rootDir, format: 'json' });

    expect(code).toBe(0);
    expect(JSON.parse(written(stdoutWrite))).toEqual({
      machines: {
        '0': { 'instance-id': 'pending' },
        '4': { 'instance-id': 'pending' },
      },
      services: {},
    });
  });

  it('writes the document to a file with --output', async () => {
    await setupEnvironment('dev.yaml', 'machines:\n  - id: 2\n');
    const outputPath = path.join(rootDir, 'status.yaml');

    const code = await statusAction({ root: rootDir, output: outputPath });

    expect(code).toBe(0);
    expect(written(stdoutWrite)).toBe('');
    expect(await fs.readFile(outputPath, 'utf-8')).toBe(
      'machines:\n  2:\n    instance-id: pending\nservices: {}\n'
    );
  });

  it('fails when no environment is configured', async () => {
    const code = await statusAction({ root: rootDir });

    expect(code).toBe(1);
    expect(written(stdoutWrite)).toBe('');
    expect(written(stderrWrite)).toBe(
      `error: no environments configured in ${path.join(rootDir, '.fleet', 'config.json')}\n`
    );
  });

  it('lists the problems of an invalid state document', async () => {
    await setupEnvironment('dev.json', JSON.stringify({ services: [{ name: 'Web', charm: 'x' }] }));

    const code = await statusAction({ root: rootDir });

    expect(code).toBe(1);
    expect(written(stderrWrite)).toBe(
      `error: invalid state for environment "dev" in ${path.join(rootDir, 'dev.json')}\n` +
        '  - services.0.name: expected a lowercase service name\n'
    );
  });

  it('produces no document when a machine references an unknown instance', async () => {
    await setupEnvironment('dev.yaml', 'machines:\n  - id: 1\n    instance-id: i-gone\n');

    const code = await statusAction({ root: rootDir });

    expect(code).toBe(1);
    expect(written(stdoutWrite)).toBe('');
    expect(written(stderrWrite)).toBe('error: instance i-gone for machine 1 not found\n');
  });

  it('reports a cancelled run', async () => {
    await setupEnvironment('dev.yaml', 'machines: []\n');
    const controller = new AbortController();
    controller.abort();

    const code = await statusAction({ root: rootDir }, controller.signal);

    expect(code).toBe(1);
    expect(written(stderrWrite)).toBe('error: status run cancelled\n');
  });
});

// =============================================================================
// Formatters
// =============================================================================

describe('formatters', () => {
  const document: StatusDocument = {
    machines: new Map([
      [1, { 'instance-id': 'i-1', 'dns-name': 'i-1.dns', 'agent-state': 'started' }],
    ]),
    services: {
      web: {
        charm: 'local:series/web-1',
        exposed: true,
        units: { 'web/0': { machine: '1', 'agent-state': 'started' } },
      },
    },
  };

  it('formats YAML', () => {
    expect(formatYaml(document)).toBe(
      [
        'machines:',
        '  1:',
        '    instance-id: i-1',
        '    dns-name: i-1.dns',
        '    agent-state: started',
        'services:',
        '  web:',
        '    charm: local:series/web-1',
        '    exposed: true',
        '    units:',
        '      web/0:',
        '        machine: "1"',
        '        agent-state: started',
        '',
      ].join('\n')
    );
  });

  it('formats JSON with two-space indentation', () => {
    const text = formatJson(document);

    expect(text.endsWith('}\n')).toBe(true);
    expect(text.split('\n')[2]).toBe('    "1": {');
  });
});
