export { CHARM_NAME, IstioBeaconCharm, MODEL_OPERATOR_PORT, modelOperatorPolicy, waypointNameFor } from './charm';
export type { IstioBeaconCharmOptions } from './charm';
export { BeaconConfigSchema, parseBeaconConfig } from './config';
export type { BeaconConfig } from './config';
export {
  addNamespaceLabels,
  DATAPLANE_MODE_LABEL,
  removeNamespaceLabels,
  USE_WAYPOINT_LABEL,
  USE_WAYPOINT_NAMESPACE_LABEL,
  WAYPOINT_MANAGED_BY_LABEL,
} from './namespace-labels';
export type { NamespaceLabelOptions } from './namespace-labels';
export { ReadinessWaiter } from './readiness';
export type { ReadinessOptions, ReadinessState } from './readiness';
