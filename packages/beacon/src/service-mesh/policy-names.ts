import { createHash } from 'node:crypto';
import { meshPolicyToWire, type MeshPolicy } from './types';

const MAX_PART_LENGTH = 30;

/** Short, stable digest of a policy's full content. */
export function policyHash(policy: MeshPolicy): string {
  return createHash('sha256').update(JSON.stringify(meshPolicyToWire(policy))).digest('hex').slice(0, 8);
}

/**
 * `<app>-<model>-policy-<source>-<source ns>-<target>-<hash>`.
 *
 * Source, namespace and target are cut to 30 characters each; the hash
 * keeps names unique after cutting and stays within the 253 character
 * object name limit for any valid app and model name.
 */
export function generateNetworkPolicyName(appName: string, modelName: string, policy: MeshPolicy): string {
  const source = (policy.sourceAppName ?? 'any-source').slice(0, MAX_PART_LENGTH);
  const sourceNamespace = (policy.sourceNamespace ?? 'any-namespace').slice(0, MAX_PART_LENGTH);
  const target = (policy.targetAppName ?? policy.targetService ?? 'selector').slice(0, MAX_PART_LENGTH);
  return `${appName}-${modelName}-policy-${source}-${sourceNamespace}-${target}-${policyHash(policy)}`;
}

/** SPIFFE principal of a Juju app's service account. */
export function principal(namespace: string, appName: string): string {
  return `cluster.local/ns/${namespace}/sa/${appName}`;
}
