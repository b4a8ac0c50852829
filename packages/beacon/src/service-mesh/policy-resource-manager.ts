import { noopLogger, type Logger } from '../core';
import type { AuthorizationPolicyConfig } from '../constructs';
import {
  createCharmDefaultLabels,
  KubernetesResourceManager,
  ResourceTypes,
  type DeleteOptions,
  type KubernetesClient,
} from '../kubernetes';
import { buildPolicyResourcesIstio } from './istio-policies';
import { MeshTypeSchema, type MeshPolicy } from './types';

export interface PolicyResourceManagerOptions {
  appName: string;
  modelName: string;
  client: KubernetesClient;
  /** Mesh the policies are rendered for (defaults to istio) */
  meshType?: string;
  /** Ownership labels (defaults to the charm labels with the istio-authorization-policy scope) */
  labels?: Record<string, string>;
  logger?: Logger;
}

/** Turns MeshPolicies into mesh-native policy objects and keeps them in sync. */
export class PolicyResourceManager {
  private readonly krm: KubernetesResourceManager;
  private readonly logger: Logger;

  constructor(private readonly options: PolicyResourceManagerOptions) {
    this.logger = options.logger ?? noopLogger;
    this.krm = new KubernetesResourceManager(options.client, {
      labels:
        options.labels ?? createCharmDefaultLabels(options.appName, options.modelName, 'istio-authorization-policy'),
      resourceTypes: [ResourceTypes.authorizationPolicy],
      logger: this.logger,
    });
  }

  get labels(): Record<string, string> {
    return this.krm.labels;
  }

  /**
   * Makes the cluster hold exactly the policies for `policies` plus the
   * ready-made `rawPolicies`. Nothing to hold means delete everything.
   */
  async reconcile(policies: MeshPolicy[], rawPolicies: AuthorizationPolicyConfig[] = []): Promise<void> {
    if (policies.length === 0 && rawPolicies.length === 0) {
      await this.delete();
      return;
    }

    const meshType = MeshTypeSchema.safeParse(this.options.meshType ?? 'istio');
    if (!meshType.success) {
      throw new Error('PolicyResourceManager instantiated with an unknown mesh type');
    }

    const resources = buildPolicyResourcesIstio(
      this.options.appName,
      this.options.modelName,
      policies,
      rawPolicies,
      this.logger,
    );
    await this.krm.reconcile(resources);
  }

  async delete(options: DeleteOptions = {}): Promise<void> {
    await this.krm.delete(options);
  }
}
