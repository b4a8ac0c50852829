/**
 * AuthorizationPolicy - Istio `security.istio.io/v1` AuthorizationPolicy.
 *
 * Field names follow the Istio API so `spec` can be passed through
 * unchanged.
 */
import { ApiObject } from 'cdk8s';
import { Construct } from 'constructs';
import { BaseConstruct, type NamespacedConfig } from '../core';
import { ResourceTypes } from '../kubernetes';

export type Action = 'ALLOW' | 'DENY';

export interface PolicyTargetReference {
  group: string;
  kind: string;
  name: string;
  namespace?: string;
}

export interface WorkloadSelector {
  matchLabels: Record<string, string>;
}

export interface Source {
  principals?: string[];
  notPrincipals?: string[];
  namespaces?: string[];
  notNamespaces?: string[];
}

export interface From {
  source: Source;
}

export interface Operation {
  hosts?: string[];
  notHosts?: string[];
  /** Istio takes ports as strings */
  ports?: string[];
  methods?: string[];
  notMethods?: string[];
  paths?: string[];
  notPaths?: string[];
}

export interface To {
  operation?: Operation;
}

export interface Condition {
  key: string;
  values?: string[];
  notValues?: string[];
}

export interface Rule {
  from?: From[];
  to?: To[];
  when?: Condition[];
}

export interface AuthorizationPolicySpec {
  /** Defaults to ALLOW */
  action?: Action;
  targetRefs?: PolicyTargetReference[];
  selector?: WorkloadSelector;
  rules: Rule[];
}

export interface AuthorizationPolicyConfig extends NamespacedConfig {
  name: string;
  spec: AuthorizationPolicySpec;
}

export class AuthorizationPolicy extends BaseConstruct<AuthorizationPolicyConfig> {
  public readonly policy: ApiObject;

  constructor(scope: Construct, id: string, config: AuthorizationPolicyConfig) {
    super(scope, id, config);

    const { action, targetRefs, selector, rules } = this.config.spec;
    if (targetRefs !== undefined && selector !== undefined) {
      throw new Error('At most one of targetRefs and selector can be set');
    }

    this.policy = new ApiObject(this, 'policy', {
      apiVersion: ResourceTypes.authorizationPolicy.apiVersion,
      kind: ResourceTypes.authorizationPolicy.kind,
      metadata: { name: this.config.name, namespace: this.namespace },
      spec: { action: action ?? 'ALLOW', targetRefs, selector, rules },
    });
  }
}
