import type { KubernetesResource, ResourceRef, ResourceType } from './types';

export class KubernetesApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'KubernetesApiError';
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof KubernetesApiError && error.statusCode === 404;
}

export interface ListOptions {
  /** All namespaces when omitted */
  namespace?: string;
  labelSelector?: string;
}

export interface ApplyOptions {
  fieldManager: string;
  /** Take over fields owned by other managers (defaults to true) */
  force?: boolean;
}

/**
 * The slice of the Kubernetes API the charm uses.
 *
 * Every method rejects with a `KubernetesApiError`.
 */
export interface KubernetesClient {
  get(ref: ResourceRef): Promise<KubernetesResource>;
  list(type: ResourceType, options?: ListOptions): Promise<KubernetesResource[]>;
  create(resource: KubernetesResource): Promise<KubernetesResource>;
  /** Server-side apply */
  apply(resource: KubernetesResource, options: ApplyOptions): Promise<KubernetesResource>;
  /** JSON merge patch; `null` values remove keys. */
  patch(ref: ResourceRef, patch: Record<string, unknown>): Promise<KubernetesResource>;
  delete(ref: ResourceRef): Promise<void>;
}
