/**
 * Render command - Print the objects a beacon would apply
 *
 * Useful for reviewing policies offline: takes the same wire-format
 * policies a consumer publishes and prints waypoint, HPA and
 * AuthorizationPolicies as multi-document YAML.
 */
import * as fs from 'node:fs';
import { deepmerge } from 'deepmerge-ts';
import * as yaml from 'yaml';
import { z } from 'zod';
import {
  buildPolicyResourcesIstio,
  createConsoleLogger,
  meshPolicyFromWire,
  modelOperatorPolicy,
  synthResources,
  Waypoint,
  WaypointAutoscaler,
  waypointNameFor,
  type KubernetesResource,
  type Logger,
} from 'istio-beacon';

export interface RenderOptions {
  /** YAML file overriding the default values */
  values?: string;
  /** Write here instead of stdout */
  output?: string;
}

const RenderValuesSchema = z.object({
  app: z.string().min(1),
  model: z.string().min(1),
  replicas: z.number().int().positive(),
  modelOnMesh: z.boolean(),
  policies: z.array(z.unknown()),
});

export type RenderValues = z.infer<typeof RenderValuesSchema>;

export const DEFAULT_VALUES: RenderValues = {
  app: 'istio-beacon-k8s',
  model: 'istio-system',
  replicas: 1,
  modelOnMesh: false,
  policies: [],
};

/** Defaults with the given overrides on top; arrays are concatenated. */
export function resolveValues(overrides: unknown): RenderValues {
  const merged = overrides === null || overrides === undefined ? DEFAULT_VALUES : deepmerge(DEFAULT_VALUES, overrides);
  return RenderValuesSchema.parse(merged);
}

export function renderResources(values: RenderValues, logger: Logger): KubernetesResource[] {
  const name = waypointNameFor(values.app, values.model);
  const waypoint = synthResources((chart) => {
    new Waypoint(chart, 'waypoint', { name, namespace: values.model });
    new WaypointAutoscaler(chart, 'waypoint-autoscaler', {
      name,
      gatewayName: name,
      replicas: values.replicas,
      namespace: values.model,
    });
  });

  const policies = buildPolicyResourcesIstio(
    values.app,
    values.model,
    values.policies.map((policy) => meshPolicyFromWire(policy)),
    values.modelOnMesh ? [modelOperatorPolicy(values.app, values.model)] : [],
    logger,
  );
  return [...waypoint, ...policies];
}

export function toMultiDocumentYaml(resources: KubernetesResource[]): string {
  return resources.map((resource) => yaml.stringify(resource)).join('---\n');
}

export async function render(options: RenderOptions): Promise<void> {
  const logger = createConsoleLogger('render');
  const overrides: unknown = options.values ? yaml.parse(fs.readFileSync(options.values, 'utf-8')) : undefined;
  const manifest = toMultiDocumentYaml(renderResources(resolveValues(overrides), logger));

  if (options.output) {
    fs.writeFileSync(options.output, manifest);
    logger.info(`Wrote ${options.output}`);
  } else {
    process.stdout.write(manifest);
  }
}
