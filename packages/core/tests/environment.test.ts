/**
 * Environment Tests
 *
 * Opening state documents from disk and the collaborators they back.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';

import { EnvironmentDocumentError, openEnvironment } from '../src/environment/connection.js';
import { LocalEnvironment, machineTag, unitTag } from '../src/environment/local-environment.js';
import { NotFoundError } from '../src/status/errors.js';
import { getStatus } from '../src/status/snapshot-assembler.js';
import { toStatusDocument } from '../src/status/document.js';

let rootDir: string;

beforeEach(async () => {
  rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fleet-env-'));
});

afterEach(async () => {
  await fs.rm(rootDir, { recursive: true, force: true });
});

async function writeState(fileName: string, content: string): Promise<void> {
  await fs.writeFile(path.join(rootDir, fileName), content);
}

const YAML_STATE = `instances:
  - id: i-0
    dns-name: i-0.example.internal
charms:
  - url: local:series/web-1
machines:
  - id: 0
    instance-id: i-0
    agent-alive: true
    tools:
      version: 1.2.3-gutsy-ppc
  - id: 1
services:
  - name: web
    charm: local:series/web-1
    exposed: true
    units:
      - machine: 0
        agent-alive: true
        status:
          code: started
`;

describe('openEnvironment', () => {
  it('reads a YAML state document', async () => {
    await writeState('dev.yaml', YAML_STATE);

    const env = await openEnvironment('dev', { type: 'local', stateFile: 'dev.yaml' }, rootDir);
    const document = toStatusDocument(await getStatus(env));

    expect(env.name).toBe('dev');
    expect(document.machines).toEqual(
      new Map([
        [
          0,
          {
            'instance-id': 'i-0',
            'dns-name': 'i-0.example.internal',
            'agent-state': 'started',
            'agent-version': '1.2.3',
          },
        ],
        [1, { 'instance-id': 'pending' }],
      ])
    );
    expect(document.services).toEqual({
      web: {
        charm: 'local:series/web-1',
        exposed: true,
        units: { 'web/0': { machine: '0', 'agent-state': 'started' } },
      },
    });
  });

  it('reads a JSON state document', async () => {
    await writeState(
      'dev.json',
      JSON.stringify({ machines: [{ id: 3 }], services: [] })
    );

    const env = await openEnvironment('dev', { type: 'local', stateFile: 'dev.json' }, rootDir);
    const document = toStatusDocument(await getStatus(env));

    expect(document.machines).toEqual(new Map([[3, { 'instance-id': 'pending' }]]));
  });

  it('treats an empty YAML file as an empty environment', async () => {
    await writeState('empty.yml', '');

    const env = await openEnvironment('empty', { type: 'local', stateFile: 'empty.yml' }, rootDir);
    const document = toStatusDocument(await getStatus(env));

    expect(document).toEqual({ machines: new Map(), services: {} });
  });

  it('fails for a missing file', async () => {
    const run = openEnvironment('dev', { type: 'local', stateFile: 'missing.yaml' }, rootDir);

    await expect(run).rejects.toBeInstanceOf(EnvironmentDocumentError);
    await expect(run).rejects.toThrow(/^cannot read state for environment "dev": /);
  });

  it('fails for a document that does not parse', async () => {
    await writeState('broken.json', '{"machines": [');

    await expect(
      openEnvironment('dev', { type: 'local', stateFile: 'broken.json' }, rootDir)
    ).rejects.toThrow(/^cannot parse state for environment "dev": /);
  });

  it('rejects an invalid document with its issues', async () => {
    await writeState(
      'bad.json',
      JSON.stringify({ services: [{ name: 'Web', charm: 'local:series/web-1' }] })
    );
    const filePath = path.join(rootDir, 'bad.json');

    const error = await openEnvironment('dev', { type: 'local', stateFile: 'bad.json' }, rootDir).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(EnvironmentDocumentError);
    if (!(error instanceof EnvironmentDocumentError)) {
      return;
    }
    expect(error.message).toBe(`invalid state for environment "dev" in ${filePath}`);
    expect(error.filePath).toBe(filePath);
    expect(error.issues).toEqual(['services.0.name: expected a lowercase service name']);
  });

  it('reports duplicate machine ids', async () => {
    await writeState('dup.json', JSON.stringify({ machines: [{ id: 0 }, { id: 0 }] }));

    const error = await openEnvironment('dev', { type: 'local', stateFile: 'dup.json' }, rootDir).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(EnvironmentDocumentError);
    if (error instanceof EnvironmentDocumentError) {
      expect(error.issues).toEqual(['machines.1: duplicate machine id 0']);
    }
  });
});

describe('LocalEnvironment', () => {
  const env = LocalEnvironment.fromDocument('local', {
    charms: [{ url: 'local:series/db-1' }],
    machines: [{ id: 2, 'agent-alive': true }],
    services: [
      {
        name: 'db',
        charm: 'local:series/db-1',
        units: [{ machine: 2 }, { 'agent-alive': true }],
      },
      { name: 'cache', charm: 'local:series/cache-1' },
    ],
  });

  it('builds tags for machines and units', () => {
    expect(machineTag(2)).toBe('machine-2');
    expect(unitTag('db/1')).toBe('unit-db-1');
  });

  it('reports liveness by tag', async () => {
    expect(await env.heartbeat.isAlive('machine-2')).toBe(true);
    expect(await env.heartbeat.isAlive('unit-db-0')).toBe(false);
    expect(await env.heartbeat.isAlive('unit-db-1')).toBe(true);
  });

  it('names units after their service and position', async () => {
    const [db] = await env.store.allServices();
    const units = (await db?.allUnits()) ?? [];

    expect(units.map((unit) => unit.name())).toEqual(['db/0', 'db/1']);
    expect(await units[0]?.assignedMachineId()).toBe(2);
    expect(await units[1]?.assignedMachineId()).toBeUndefined();
  });

  it('signals a machine without an instance as not found', async () => {
    const [machine] = await env.store.allMachines();

    await expect(machine?.instanceId()).rejects.toBeInstanceOf(NotFoundError);
  });

  it('fails to resolve a charm that is not listed', async () => {
    const services = await env.store.allServices();

    await expect(services[1]?.charm()).rejects.toThrow('charm local:series/cache-1 not found');
  });
});
