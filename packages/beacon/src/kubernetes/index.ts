export { isNotFound, KubernetesApiError } from './client';
export type { ApplyOptions, KubernetesClient, ListOptions } from './client';
export {
  charmKubernetesLabel,
  createCharmDefaultLabels,
  formatLabelSelector,
  matchesLabelSelector,
  MAX_LABEL_LENGTH,
} from './labels';
export { NodeKubernetesClient } from './node-client';
export { KubernetesResourceManager } from './resource-manager';
export type { DeleteOptions, ResourceManagerOptions } from './resource-manager';
export {
  isRecord,
  KubernetesResourceSchema,
  ObjectMetaSchema,
  refFor,
  refOf,
  resourceKey,
  ResourceTypes,
} from './types';
export type { KubernetesResource, ResourceRef, ResourceType } from './types';
