import { z } from 'zod';
import { MeshPolicyValidationError } from '../core';

export const METHODS = ['CONNECT', 'DELETE', 'GET', 'HEAD', 'OPTIONS', 'PATCH', 'POST', 'PUT', 'TRACE'] as const;
export const MethodSchema = z.enum(METHODS);
export type Method = z.infer<typeof MethodSchema>;

export const MESH_TYPES = ['istio'] as const;
export const MeshTypeSchema = z.enum(MESH_TYPES);
export type MeshType = z.infer<typeof MeshTypeSchema>;

export type PolicyTargetType = 'app' | 'unit';

/** Traffic allowed to reach a target. An omitted field matches anything. */
export interface Endpoint {
  hosts?: string[];
  ports?: number[];
  methods?: Method[];
  paths?: string[];
}

/** Lets every app on `relation` reach this app's Service (L4 and L7 rules). */
export interface AppPolicy {
  type: 'app';
  relation: string;
  endpoints: Endpoint[];
  /** Service to target instead of the app's own Service */
  service?: string;
}

/** Lets every app on `relation` reach this app's pods directly, ports only. */
export interface UnitPolicy {
  type: 'unit';
  relation: string;
  /** All ports when omitted */
  ports?: number[];
}

/** @deprecated Use AppPolicy. */
export type Policy = AppPolicy;

export type ConsumerPolicy = AppPolicy | UnitPolicy;

export function appPolicy(policy: Omit<AppPolicy, 'type'>): AppPolicy {
  return { type: 'app', ...policy };
}

export function unitPolicy(policy: Omit<UnitPolicy, 'type'>): UnitPolicy {
  return { type: 'unit', ...policy };
}

/**
 * A fully resolved policy as exchanged between consumer and provider.
 * Missing source fields mean "any".
 */
export interface MeshPolicy {
  sourceAppName?: string;
  sourceNamespace?: string;
  targetAppName?: string;
  targetNamespace: string;
  targetService?: string;
  targetSelectorLabels?: Record<string, string>;
  targetType: PolicyTargetType;
  endpoints: Endpoint[];
}

/** Throws a MeshPolicyValidationError for contradictory targets. */
export function validateMeshPolicy(policy: MeshPolicy): MeshPolicy {
  if (policy.targetType === 'app') {
    if (!policy.targetAppName && !policy.targetService) {
      throw new MeshPolicyValidationError(
        'Bad policy configuration. Neither target_app_name nor target_service specified for MeshPolicy with target_type app',
      );
    }
    if (policy.targetSelectorLabels) {
      throw new MeshPolicyValidationError(
        'Bad policy configuration. MeshPolicy with target_type app does not support target_selector_labels.',
      );
    }
  } else {
    if (policy.targetAppName && policy.targetSelectorLabels) {
      throw new MeshPolicyValidationError(
        'Bad policy configuration. MeshPolicy with target_type unit cannot specify both target_app_name and target_selector_labels.',
      );
    }
    if (!policy.targetAppName && !policy.targetSelectorLabels) {
      throw new MeshPolicyValidationError(
        'Bad policy configuration. Neither target_app_name nor target_selector_labels specified for MeshPolicy with target_type unit',
      );
    }
  }
  return policy;
}

// --- Relation data wire format ---

export const EndpointWireSchema = z.object({
  hosts: z.array(z.string()).nullish(),
  ports: z.array(z.number().int()).nullish(),
  methods: z.array(MethodSchema).nullish(),
  paths: z.array(z.string()).nullish(),
});
export type EndpointWire = z.infer<typeof EndpointWireSchema>;

export const MeshPolicyWireSchema = z.object({
  source_app_name: z.string().nullish(),
  source_namespace: z.string().nullish(),
  target_app_name: z.string().nullish(),
  target_namespace: z.string(),
  target_service: z.string().nullish(),
  target_selector_labels: z.record(z.string()).nullish(),
  target_type: z.enum(['app', 'unit']).default('app'),
  endpoints: z.array(EndpointWireSchema).default([]),
});
export type MeshPolicyWire = z.input<typeof MeshPolicyWireSchema>;

/** A JSON-encoded relation data value holding `schema`. */
export function jsonString<T extends z.ZodTypeAny>(schema: T) {
  return z
    .string()
    .transform((raw, ctx): unknown => {
      try {
        return JSON.parse(raw);
      } catch (error) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid JSON: ${String(error)}` });
        return z.NEVER;
      }
    })
    .pipe(schema);
}

export const ProviderAppDataSchema = z.object({
  labels: jsonString(z.record(z.string())),
  mesh_type: jsonString(MeshTypeSchema),
});
export type ProviderAppData = z.infer<typeof ProviderAppDataSchema>;

export const CrossModelMeshDataSchema = z.object({
  app_name: z.string(),
  juju_model_name: z.string(),
});
export type CrossModelMeshData = z.infer<typeof CrossModelMeshDataSchema>;

function present<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined;
}

export function endpointToWire(endpoint: Endpoint): EndpointWire {
  return {
    hosts: endpoint.hosts ?? null,
    ports: endpoint.ports ?? null,
    methods: endpoint.methods ?? null,
    paths: endpoint.paths ?? null,
  };
}

export function meshPolicyToWire(policy: MeshPolicy): MeshPolicyWire {
  return {
    source_app_name: policy.sourceAppName ?? null,
    source_namespace: policy.sourceNamespace ?? null,
    target_app_name: policy.targetAppName ?? null,
    target_namespace: policy.targetNamespace,
    target_service: policy.targetService ?? null,
    target_selector_labels: policy.targetSelectorLabels ?? null,
    target_type: policy.targetType,
    endpoints: policy.endpoints.map(endpointToWire),
  };
}

/** Parses and validates one policy from relation data. */
export function meshPolicyFromWire(value: unknown): MeshPolicy {
  const wire = MeshPolicyWireSchema.parse(value);
  return validateMeshPolicy({
    sourceAppName: present(wire.source_app_name),
    sourceNamespace: present(wire.source_namespace),
    targetAppName: present(wire.target_app_name),
    targetNamespace: wire.target_namespace,
    targetService: present(wire.target_service),
    targetSelectorLabels: present(wire.target_selector_labels),
    targetType: wire.target_type,
    endpoints: wire.endpoints.map((endpoint) => ({
      hosts: present(endpoint.hosts),
      ports: present(endpoint.ports),
      methods: present(endpoint.methods),
      paths: present(endpoint.paths),
    })),
  });
}
