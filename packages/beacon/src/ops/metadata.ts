import * as fs from 'node:fs';
import * as yaml from 'yaml';
import { z } from 'zod';

const RelationEndpointSchema = z.object({
  interface: z.string(),
  limit: z.number().int().positive().optional(),
  optional: z.boolean().optional(),
  description: z.string().optional(),
});

const ConfigOptionSchema = z.object({
  type: z.enum(['string', 'int', 'float', 'boolean', 'secret']),
  default: z.union([z.string(), z.number(), z.boolean()]).optional(),
  description: z.string().optional(),
});

export const CharmMetadataSchema = z.object({
  name: z.string(),
  summary: z.string().optional(),
  description: z.string().optional(),
  assumes: z.array(z.unknown()).optional(),
  containers: z.record(z.object({ resource: z.string().optional() }).passthrough()).default({}),
  resources: z
    .record(
      z.object({
        type: z.string(),
        description: z.string().optional(),
        'upstream-source': z.string().optional(),
      }),
    )
    .default({}),
  provides: z.record(RelationEndpointSchema).default({}),
  requires: z.record(RelationEndpointSchema).default({}),
  peers: z.record(RelationEndpointSchema).default({}),
  config: z.object({ options: z.record(ConfigOptionSchema).default({}) }).default({}),
});

export type CharmMetadata = z.infer<typeof CharmMetadataSchema>;
export type ConfigValue = string | number | boolean;

export function parseCharmMetadata(source: string): CharmMetadata {
  return CharmMetadataSchema.parse(yaml.parse(source));
}

export function loadCharmMetadata(path: string | URL): CharmMetadata {
  return parseCharmMetadata(fs.readFileSync(path, 'utf-8'));
}

/** Defaults Juju hands out for options nobody has set. */
export function configDefaults(metadata: CharmMetadata): Record<string, ConfigValue> {
  const defaults: Record<string, ConfigValue> = {};
  for (const [key, option] of Object.entries(metadata.config.options)) {
    if (option.default !== undefined) defaults[key] = option.default;
  }
  return defaults;
}

/** Names of the non-peer relation endpoints. */
export function relationEndpoints(metadata: CharmMetadata): string[] {
  return [...Object.keys(metadata.provides), ...Object.keys(metadata.requires)];
}
