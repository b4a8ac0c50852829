import { ApiObject } from 'cdk8s';
import { Construct } from 'constructs';
import { BaseConstruct, type NamespacedConfig } from '../core';
import { ResourceTypes } from '../kubernetes';

export interface WaypointAutoscalerConfig extends NamespacedConfig {
  /** HPA name */
  name: string;
  /** Gateway whose waypoint Deployment is scaled */
  gatewayName: string;
  /** Pinned replica count, used as both min and max */
  replicas: number;
}

/** Pins the waypoint replica count through an HPA on the Gateway. */
export class WaypointAutoscaler extends BaseConstruct<WaypointAutoscalerConfig> {
  public readonly hpa: ApiObject;

  constructor(scope: Construct, id: string, config: WaypointAutoscalerConfig) {
    super(scope, id, config);

    this.hpa = new ApiObject(this, 'hpa', {
      apiVersion: ResourceTypes.horizontalPodAutoscaler.apiVersion,
      kind: ResourceTypes.horizontalPodAutoscaler.kind,
      metadata: { name: this.config.name, namespace: this.namespace },
      spec: {
        scaleTargetRef: {
          apiVersion: ResourceTypes.gateway.apiVersion,
          kind: ResourceTypes.gateway.kind,
          name: this.config.gatewayName,
        },
        minReplicas: this.config.replicas,
        maxReplicas: this.config.replicas,
      },
    });
  }
}
