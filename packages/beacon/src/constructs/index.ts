export { AuthorizationPolicy } from './authorization-policy';
export type {
  Action,
  AuthorizationPolicyConfig,
  AuthorizationPolicySpec,
  Condition,
  From,
  Operation,
  PolicyTargetReference,
  Rule,
  Source,
  To,
  WorkloadSelector,
} from './authorization-policy';
export { synthResources } from './synth';
export { Waypoint } from './waypoint';
export type { WaypointConfig, WaypointTrafficType } from './waypoint';
export { WaypointAutoscaler } from './waypoint-autoscaler';
export type { WaypointAutoscalerConfig } from './waypoint-autoscaler';
