/**
 * Environment document schema
 *
 * A state document describes one environment as the store, the provider
 * and the heartbeat subsystem would report it.
 *
 * @example
 * ```yaml
 * instances:
 *   - id: i-0
 *     dns-name: i-0.example.internal
 * charms:
 *   - url: local:series/dummy-1
 * machines:
 *   - id: 0
 *     instance-id: i-0
 *     agent-alive: true
 *     status: { code: started }
 *     tools: { version: 1.2.3, series: gutsy, arch: ppc }
 * services:
 *   - name: dummy-service
 *     charm: local:series/dummy-1
 *     units:
 *       - machine: 0
 *         agent-alive: true
 * ```
 */

import { z } from 'zod';

const agentStatusSchema = z.object({
  code: z.enum(['pending', 'started', 'stopped', 'error']),
  info: z.string().default(''),
});

const instanceSchema = z.object({
  id: z.string().min(1),
  'dns-name': z.string().min(1).optional(),
});

const charmSchema = z.object({
  url: z.string().min(1),
});

const toolsSchema = z.object({
  version: z.string().regex(/^\d+\.\d+\.\d+(\.\d+)?(-[\w-]+)?$/, 'expected major.minor.patch[.build]'),
  series: z.string().optional(),
  arch: z.string().optional(),
});

const machineSchema = z.object({
  id: z.number().int().min(0),
  'instance-id': z.string().min(1).optional(),
  'agent-alive': z.boolean().default(false),
  status: agentStatusSchema.optional(),
  tools: toolsSchema.optional(),
});

const unitSchema = z.object({
  machine: z.number().int().min(0).optional(),
  'agent-alive': z.boolean().default(false),
  status: agentStatusSchema.optional(),
});

const serviceSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9-]*$/, 'expected a lowercase service name'),
  charm: z.string().min(1),
  exposed: z.boolean().default(false),
  units: z.array(unitSchema).default([]),
});

export const environmentDocumentSchema = z
  .object({
    instances: z.array(instanceSchema).default([]),
    charms: z.array(charmSchema).default([]),
    machines: z.array(machineSchema).default([]),
    services: z.array(serviceSchema).default([]),
  })
  .superRefine((doc, ctx) => {
    reportDuplicates(doc.machines.map((m) => m.id), 'machines', 'machine id', ctx);
    reportDuplicates(doc.services.map((s) => s.name), 'services', 'service name', ctx);
  });

/** Document as written, before defaults are applied */
export type EnvironmentDocumentInput = z.input<typeof environmentDocumentSchema>;

/** Document after validation */
export type EnvironmentDocument = z.output<typeof environmentDocumentSchema>;
export type MachineRecord = z.output<typeof machineSchema>;
export type ServiceRecord = z.output<typeof serviceSchema>;
export type UnitRecord = z.output<typeof unitSchema>;
export type InstanceRecord = z.output<typeof instanceSchema>;

function reportDuplicates(
  values: ReadonlyArray<string | number>,
  section: string,
  what: string,
  ctx: z.RefinementCtx
): void {
  const seen = new Set<string | number>();
  values.forEach((value, index) => {
    if (seen.has(value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [section, index],
        message: `duplicate ${what} ${JSON.stringify(value)}`,
      });
    }
    seen.add(value);
  });
}
