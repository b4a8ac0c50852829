import { noopLogger, type Logger } from '../core';
import {
  AuthorizationPolicy,
  synthResources,
  type AuthorizationPolicyConfig,
  type From,
  type Operation,
  type Rule,
  type To,
} from '../constructs';
import type { KubernetesResource } from '../kubernetes';
import { generateNetworkPolicyName, principal } from './policy-names';
import type { Endpoint, MeshPolicy } from './types';

function nonEmpty<T>(values: T[] | undefined): T[] | undefined {
  return values && values.length > 0 ? values : undefined;
}

function sourceOf(policy: MeshPolicy): From[] | undefined {
  // a named source without a namespace lives beside its target
  if (policy.sourceAppName) {
    const namespace = policy.sourceNamespace ?? policy.targetNamespace;
    return [{ source: { principals: [principal(namespace, policy.sourceAppName)] } }];
  }
  if (policy.sourceNamespace) {
    return [{ source: { namespaces: [policy.sourceNamespace] } }];
  }
  return undefined;
}

function operationOf(endpoint: Endpoint): To {
  const operation: Operation = {
    hosts: nonEmpty(endpoint.hosts),
    ports: nonEmpty(endpoint.ports)?.map(String),
    methods: nonEmpty(endpoint.methods),
    paths: nonEmpty(endpoint.paths),
  };
  return { operation };
}

function hasL7Attributes(endpoint: Endpoint): boolean {
  return Boolean(nonEmpty(endpoint.hosts) || nonEmpty(endpoint.methods) || nonEmpty(endpoint.paths));
}

/**
 * The AuthorizationPolicy for one MeshPolicy, or undefined when the policy
 * cannot be expressed: pod-targeted policies are enforced by ztunnel,
 * which only sees ports.
 */
export function authorizationPolicyFor(
  appName: string,
  modelName: string,
  policy: MeshPolicy,
  logger: Logger = noopLogger,
): AuthorizationPolicyConfig | undefined {
  const rule: Rule = { from: sourceOf(policy) };
  const name = generateNetworkPolicyName(appName, modelName, policy);

  if (policy.targetType === 'app') {
    if (policy.endpoints.length > 0) rule.to = policy.endpoints.map(operationOf);
    return {
      name,
      namespace: policy.targetNamespace,
      spec: {
        action: 'ALLOW',
        targetRefs: [{ kind: 'Service', group: '', name: policy.targetService ?? policy.targetAppName ?? '' }],
        rules: [rule],
      },
    };
  }

  if (policy.endpoints.some(hasL7Attributes)) {
    logger.error(
      `Skipping policy ${name}: unit-targeted policies only support ports, got hosts, methods or paths`,
    );
    return undefined;
  }
  if (policy.endpoints.length > 0) {
    rule.to = policy.endpoints.map((endpoint) => ({ operation: { ports: nonEmpty(endpoint.ports)?.map(String) } }));
  }
  return {
    name,
    namespace: policy.targetNamespace,
    spec: {
      action: 'ALLOW',
      selector: {
        matchLabels: policy.targetSelectorLabels ?? { 'app.kubernetes.io/name': policy.targetAppName ?? '' },
      },
      rules: [rule],
    },
  };
}

/** Renders AuthorizationPolicy objects; inexpressible policies are left out. */
export function buildPolicyResourcesIstio(
  appName: string,
  modelName: string,
  policies: MeshPolicy[],
  rawPolicies: AuthorizationPolicyConfig[] = [],
  logger: Logger = noopLogger,
): KubernetesResource[] {
  const configs = policies
    .map((policy) => authorizationPolicyFor(appName, modelName, policy, logger))
    .filter((config): config is AuthorizationPolicyConfig => config !== undefined);

  return synthResources((chart) => {
    [...configs, ...rawPolicies].forEach((config, index) => {
      new AuthorizationPolicy(chart, `policy-${index}`, config);
    });
  });
}
