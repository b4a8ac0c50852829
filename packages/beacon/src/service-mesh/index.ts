export { charmLabelsConfigMapName, reconcileCharmLabels } from './charm-labels';
export type { CharmLabelsOptions } from './charm-labels';
export { ServiceMeshConsumer } from './consumer';
export type { ServiceMeshConsumerOptions } from './consumer';
export { authorizationPolicyFor, buildPolicyResourcesIstio } from './istio-policies';
export { generateNetworkPolicyName, policyHash, principal } from './policy-names';
export { PolicyResourceManager } from './policy-resource-manager';
export type { PolicyResourceManagerOptions } from './policy-resource-manager';
export { ServiceMeshProvider } from './provider';
export type { ServiceMeshProviderOptions } from './provider';
export {
  appPolicy,
  CrossModelMeshDataSchema,
  EndpointWireSchema,
  endpointToWire,
  jsonString,
  MESH_TYPES,
  meshPolicyFromWire,
  meshPolicyToWire,
  MeshPolicyWireSchema,
  MeshTypeSchema,
  METHODS,
  MethodSchema,
  ProviderAppDataSchema,
  unitPolicy,
  validateMeshPolicy,
} from './types';
export type {
  AppPolicy,
  ConsumerPolicy,
  CrossModelMeshData,
  Endpoint,
  EndpointWire,
  MeshPolicy,
  MeshPolicyWire,
  MeshType,
  Method,
  Policy,
  PolicyTargetType,
  ProviderAppData,
  UnitPolicy,
} from './types';
