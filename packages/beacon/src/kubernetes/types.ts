import { z } from 'zod';

export const ObjectMetaSchema = z
  .object({
    name: z.string(),
    namespace: z.string().optional(),
    labels: z.record(z.string()).optional(),
    annotations: z.record(z.string()).optional(),
  })
  .passthrough();

export const KubernetesResourceSchema = z
  .object({
    apiVersion: z.string(),
    kind: z.string(),
    metadata: ObjectMetaSchema,
  })
  .passthrough();

export type KubernetesResource = z.infer<typeof KubernetesResourceSchema>;

/** A kind of object, as listed and garbage-collected by a resource manager. */
export interface ResourceType {
  apiVersion: string;
  kind: string;
  /** Cluster-scoped kinds such as Namespace */
  clusterScoped?: boolean;
}

/** Enough to address one object. */
export interface ResourceRef {
  apiVersion: string;
  kind: string;
  name: string;
  namespace?: string;
}

export const ResourceTypes = {
  namespace: { apiVersion: 'v1', kind: 'Namespace', clusterScoped: true },
  configMap: { apiVersion: 'v1', kind: 'ConfigMap' },
  service: { apiVersion: 'v1', kind: 'Service' },
  statefulSet: { apiVersion: 'apps/v1', kind: 'StatefulSet' },
  deployment: { apiVersion: 'apps/v1', kind: 'Deployment' },
  gateway: { apiVersion: 'gateway.networking.k8s.io/v1', kind: 'Gateway' },
  horizontalPodAutoscaler: { apiVersion: 'autoscaling/v2', kind: 'HorizontalPodAutoscaler' },
  authorizationPolicy: { apiVersion: 'security.istio.io/v1', kind: 'AuthorizationPolicy' },
} as const satisfies Record<string, ResourceType>;

export function refOf(resource: KubernetesResource): ResourceRef {
  return {
    apiVersion: resource.apiVersion,
    kind: resource.kind,
    name: resource.metadata.name,
    namespace: resource.metadata.namespace,
  };
}

export function resourceKey(ref: ResourceRef): string {
  return `${ref.apiVersion}/${ref.kind}/${ref.namespace ?? ''}/${ref.name}`;
}

export function refFor(type: ResourceType, name: string, namespace?: string): ResourceRef {
  return { apiVersion: type.apiVersion, kind: type.kind, name, namespace: type.clusterScoped ? undefined : namespace };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
