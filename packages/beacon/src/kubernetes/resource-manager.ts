import { noopLogger, type Logger } from '../core';
import { isNotFound, type KubernetesClient } from './client';
import { formatLabelSelector } from './labels';
import { refOf, resourceKey, type KubernetesResource, type ResourceType } from './types';

export interface ResourceManagerOptions {
  /** Labels stamped on, and used to find, every managed object */
  labels: Record<string, string>;
  /** Kinds this manager lists when collecting stale objects */
  resourceTypes: ResourceType[];
  /** Limit listing to one namespace (defaults to all namespaces) */
  namespace?: string;
  /** Server-side apply field manager (defaults to the scope label) */
  fieldManager?: string;
  logger?: Logger;
}

export interface DeleteOptions {
  /** Swallow 404s such as a missing CRD (defaults to true) */
  ignoreMissing?: boolean;
}

/**
 * Owns a labelled set of Kubernetes objects.
 *
 * `reconcile` makes the cluster hold exactly the desired objects among those
 * carrying the manager labels; objects without them are never touched.
 */
export class KubernetesResourceManager {
  private readonly logger: Logger;
  private readonly fieldManager: string;

  constructor(
    private readonly client: KubernetesClient,
    private readonly options: ResourceManagerOptions,
  ) {
    this.logger = options.logger ?? noopLogger;
    this.fieldManager =
      options.fieldManager ?? options.labels['kubernetes-resource-handler-scope'] ?? 'istio-beacon';
  }

  get labels(): Record<string, string> {
    return this.options.labels;
  }

  async reconcile(desired: KubernetesResource[]): Promise<void> {
    const labelled = desired.map((resource) => this.withLabels(resource));

    for (const resource of labelled) {
      this.logger.debug(`Applying ${resource.kind} ${resource.metadata.name}`);
      await this.client.apply(resource, { fieldManager: this.fieldManager, force: true });
    }

    const wanted = new Set(labelled.map((resource) => resourceKey(refOf(resource))));
    for (const existing of await this.getManaged()) {
      if (wanted.has(resourceKey(refOf(existing)))) continue;
      this.logger.info(`Deleting stale ${existing.kind} ${existing.metadata.name}`);
      await this.client.delete(refOf(existing));
    }
  }

  async delete(options: DeleteOptions = {}): Promise<void> {
    const ignoreMissing = options.ignoreMissing ?? true;
    try {
      for (const existing of await this.getManaged()) {
        this.logger.info(`Deleting ${existing.kind} ${existing.metadata.name}`);
        await this.client.delete(refOf(existing));
      }
    } catch (error) {
      if (!(ignoreMissing && isNotFound(error))) throw error;
      this.logger.info('CRD not found, skipping deletion');
    }
  }

  /** Every object of the managed kinds that carries the manager labels. */
  async getManaged(): Promise<KubernetesResource[]> {
    const labelSelector = formatLabelSelector(this.options.labels);
    const found: KubernetesResource[] = [];
    for (const type of this.options.resourceTypes) {
      found.push(...(await this.client.list(type, { namespace: this.options.namespace, labelSelector })));
    }
    return found;
  }

  private withLabels(resource: KubernetesResource): KubernetesResource {
    return {
      ...resource,
      metadata: {
        ...resource.metadata,
        labels: { ...resource.metadata.labels, ...this.options.labels },
      },
    };
  }
}
