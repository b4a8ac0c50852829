import { z } from 'zod';
import { ConfigError } from '../core';

export const BeaconConfigSchema = z.object({
  'manage-authorization-policies': z.boolean().default(true),
  'model-on-mesh': z.boolean().default(false),
  'ready-timeout': z.number().int().positive().default(100),
});

export interface BeaconConfig {
  /** Render AuthorizationPolicies for the policies requested over service-mesh */
  manageAuthorizationPolicies: boolean;
  /** Put the whole model (namespace) on the mesh through namespace labels */
  modelOnMesh: boolean;
  /** Seconds to wait for the waypoint deployment */
  readyTimeoutSeconds: number;
}

/** Validates raw charm config; unset options take their documented defaults. */
export function parseBeaconConfig(raw: Record<string, unknown>): BeaconConfig {
  const parsed = BeaconConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`invalid config: ${details}`);
  }
  return {
    manageAuthorizationPolicies: parsed.data['manage-authorization-policies'],
    modelOnMesh: parsed.data['model-on-mesh'],
    readyTimeoutSeconds: parsed.data['ready-timeout'],
  };
}
