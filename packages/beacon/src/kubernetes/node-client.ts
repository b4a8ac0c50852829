import {
  ApiException,
  KubeConfig,
  KubernetesObjectApi,
  PatchStrategy,
} from '@kubernetes/client-node';
import { errorMessage } from '../core';
import { KubernetesApiError, type ApplyOptions, type KubernetesClient, type ListOptions } from './client';
import { isRecord, KubernetesResourceSchema, type KubernetesResource, type ResourceRef, type ResourceType } from './types';

function toApiError(error: unknown, action: string): KubernetesApiError {
  if (error instanceof ApiException) {
    return new KubernetesApiError(`${action}: ${errorMessage(error)}`, error.code);
  }
  return new KubernetesApiError(`${action}: ${errorMessage(error)}`);
}

function header(ref: ResourceRef): Parameters<KubernetesObjectApi['read']>[0] {
  return {
    apiVersion: ref.apiVersion,
    kind: ref.kind,
    metadata: { name: ref.name, namespace: ref.namespace },
  };
}

function describe(ref: ResourceRef): string {
  return ref.namespace ? `${ref.kind} ${ref.namespace}/${ref.name}` : `${ref.kind} ${ref.name}`;
}

/** `KubernetesClient` on top of the generic object API of @kubernetes/client-node. */
export class NodeKubernetesClient implements KubernetesClient {
  private readonly api: KubernetesObjectApi;

  constructor(kubeConfig?: KubeConfig) {
    const kc = kubeConfig ?? NodeKubernetesClient.inClusterConfig();
    this.api = KubernetesObjectApi.makeApiClient(kc);
  }

  /** In-cluster service account config, falling back to ~/.kube/config. */
  static inClusterConfig(): KubeConfig {
    const kc = new KubeConfig();
    if (process.env.KUBERNETES_SERVICE_HOST) {
      kc.loadFromCluster();
    } else {
      kc.loadFromDefault();
    }
    return kc;
  }

  async get(ref: ResourceRef): Promise<KubernetesResource> {
    try {
      return KubernetesResourceSchema.parse(await this.api.read(header(ref)));
    } catch (error) {
      throw toApiError(error, `get ${describe(ref)}`);
    }
  }

  async list(type: ResourceType, options: ListOptions = {}): Promise<KubernetesResource[]> {
    try {
      const result = await this.api.list(
        type.apiVersion,
        type.kind,
        type.clusterScoped ? undefined : options.namespace,
        undefined,
        undefined,
        undefined,
        undefined,
        options.labelSelector,
      );
      // list items come back without apiVersion and kind
      return result.items.map((item) =>
        KubernetesResourceSchema.parse({ ...item, apiVersion: type.apiVersion, kind: type.kind }),
      );
    } catch (error) {
      throw toApiError(error, `list ${type.kind}`);
    }
  }

  async create(resource: KubernetesResource): Promise<KubernetesResource> {
    try {
      return KubernetesResourceSchema.parse(await this.api.create(resource));
    } catch (error) {
      throw toApiError(error, `create ${resource.kind} ${resource.metadata.name}`);
    }
  }

  async apply(resource: KubernetesResource, options: ApplyOptions): Promise<KubernetesResource> {
    try {
      const applied = await this.api.patch(
        resource,
        undefined,
        undefined,
        options.fieldManager,
        options.force ?? true,
        PatchStrategy.ServerSideApply,
      );
      return KubernetesResourceSchema.parse(applied);
    } catch (error) {
      throw toApiError(error, `apply ${resource.kind} ${resource.metadata.name}`);
    }
  }

  async patch(ref: ResourceRef, patch: Record<string, unknown>): Promise<KubernetesResource> {
    try {
      const metadata = isRecord(patch.metadata) ? patch.metadata : {};
      const body = {
        ...patch,
        apiVersion: ref.apiVersion,
        kind: ref.kind,
        metadata: { ...metadata, name: ref.name, namespace: ref.namespace },
      };
      const patched = await this.api.patch(body, undefined, undefined, undefined, undefined, PatchStrategy.MergePatch);
      return KubernetesResourceSchema.parse(patched);
    } catch (error) {
      throw toApiError(error, `patch ${describe(ref)}`);
    }
  }

  async delete(ref: ResourceRef): Promise<void> {
    try {
      await this.api.delete(header(ref));
    } catch (error) {
      throw toApiError(error, `delete ${describe(ref)}`);
    }
  }
}
