/**
 * BaseConstruct - Foundation class for the charm's cdk8s constructs.
 *
 * Keeps the typed config and resolves the namespace a construct renders
 * into: its own config first, then the enclosing chart.
 *
 * @example
 * ```typescript
 * export interface WaypointConfig {
 *   name: string;
 *   namespace?: string;
 * }
 *
 * export class Waypoint extends BaseConstruct<WaypointConfig> {
 *   constructor(scope: Construct, id: string, config: WaypointConfig) {
 *     super(scope, id, config);
 *     new ApiObject(this, "gateway", { ..., metadata: { name: this.config.name, namespace: this.namespace } });
 *   }
 * }
 * ```
 */

import { Chart } from 'cdk8s';
import { Construct } from 'constructs';

export interface NamespacedConfig {
  /** Namespace of the rendered objects (defaults to the chart namespace) */
  namespace?: string;
}

export abstract class BaseConstruct<TConfig extends NamespacedConfig = NamespacedConfig> extends Construct {
  protected readonly config: TConfig;

  constructor(scope: Construct, id: string, config: TConfig) {
    super(scope, id);
    this.config = config;
  }

  protected get namespace(): string | undefined {
    return this.config.namespace ?? Chart.of(this).namespace;
  }
}
