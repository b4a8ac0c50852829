/**
 * Waypoint - Istio ambient waypoint proxy for a namespace.
 *
 * Renders a Gateway API `Gateway` of class `istio-waypoint`; istiod turns
 * it into the waypoint Deployment and Service of the same name.
 *
 * @example
 * ```typescript
 * new Waypoint(chart, "waypoint", { name: "beacon-dev-waypoint", namespace: "dev" });
 * ```
 */
import { ApiObject } from 'cdk8s';
import { Construct } from 'constructs';
import { BaseConstruct, type NamespacedConfig } from '../core';
import { ResourceTypes } from '../kubernetes';

export type WaypointTrafficType = 'service' | 'workload' | 'all' | 'none';

export interface WaypointConfig extends NamespacedConfig {
  /** Gateway name, also the name of the waypoint Deployment */
  name: string;
  /** Traffic the waypoint intercepts (defaults to service) */
  waypointFor?: WaypointTrafficType;
  /** Gateway class (defaults to istio-waypoint) */
  gatewayClassName?: string;
  /** HBONE listener port (defaults to 15008) */
  port?: number;
}

export class Waypoint extends BaseConstruct<WaypointConfig> {
  public readonly gateway: ApiObject;

  constructor(scope: Construct, id: string, config: WaypointConfig) {
    super(scope, id, config);

    this.gateway = new ApiObject(this, 'gateway', {
      apiVersion: ResourceTypes.gateway.apiVersion,
      kind: ResourceTypes.gateway.kind,
      metadata: {
        name: this.config.name,
        namespace: this.namespace,
        labels: { 'istio.io/waypoint-for': this.config.waypointFor ?? 'service' },
      },
      spec: {
        gatewayClassName: this.config.gatewayClassName ?? 'istio-waypoint',
        listeners: [
          {
            name: 'mesh',
            port: this.config.port ?? 15008,
            protocol: 'HBONE',
            allowedRoutes: { namespaces: { from: 'Same' } },
          },
        ],
      },
    });
  }
}
