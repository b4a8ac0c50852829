/**
 * IstioBeaconCharm - Joins the apps of a Juju model to the Istio ambient mesh.
 *
 * The leader owns a waypoint (Gateway + HPA) for the model, the
 * AuthorizationPolicies requested over `service-mesh`, and optionally the
 * namespace labels that put the whole model on the mesh. Every unit runs
 * the metrics proxy in front of the waypoint pods.
 */
import { z } from 'zod';
import { createConsoleLogger, ConfigError, type Logger } from '../core';
import { synthResources, Waypoint, WaypointAutoscaler, type AuthorizationPolicyConfig } from '../constructs';
import {
  charmKubernetesLabel,
  createCharmDefaultLabels,
  isNotFound,
  KubernetesResourceManager,
  refFor,
  ResourceTypes,
  type KubernetesClient,
} from '../kubernetes';
import { CharmBase, Status, type CharmBackend, type HookName } from '../ops';
import { METRICS_PROXY_CONTAINER, METRICS_PROXY_PORT, metricsProxyLayer, type PebbleClient } from '../pebble';
import { MetricsEndpointProvider, PeerStateStore, TracingEndpointRequirer } from '../relations';
import {
  charmLabelsConfigMapName,
  PolicyResourceManager,
  reconcileCharmLabels,
  ServiceMeshProvider,
} from '../service-mesh';
import { parseBeaconConfig, type BeaconConfig } from './config';
import {
  addNamespaceLabels,
  DATAPLANE_MODE_LABEL,
  removeNamespaceLabels,
  USE_WAYPOINT_LABEL,
  USE_WAYPOINT_NAMESPACE_LABEL,
} from './namespace-labels';
import { ReadinessWaiter } from './readiness';

export const CHARM_NAME = 'istio-beacon-k8s';
export const MODEL_OPERATOR_PORT = 17071;

/** Name of the waypoint Gateway (and Deployment) of a beacon. */
export function waypointNameFor(appName: string, modelName: string): string {
  return charmKubernetesLabel(appName, modelName, '-waypoint');
}

/** The Juju model operator must stay reachable once the namespace is on the mesh. */
export function modelOperatorPolicy(appName: string, modelName: string): AuthorizationPolicyConfig {
  return {
    name: `${appName}-${modelName}-policy-all-sources-modeloperator`,
    namespace: modelName,
    spec: {
      action: 'ALLOW',
      selector: { matchLabels: { 'operator.juju.is/name': 'modeloperator' } },
      rules: [{ to: [{ operation: { ports: [String(MODEL_OPERATOR_PORT)] } }] }],
    },
  };
}

export interface IstioBeaconCharmOptions {
  kubernetes: KubernetesClient;
  /** Pebble of the metrics-proxy container */
  pebble: PebbleClient;
  logger?: Logger;
  /** Seconds between waypoint readiness probes (defaults to 5) */
  readinessIntervalSeconds?: number;
}

const DeploymentStatusSchema = z.object({
  status: z
    .object({
      replicas: z.number().optional(),
      readyReplicas: z.number().optional(),
    })
    .optional(),
});

export class IstioBeaconCharm extends CharmBase {
  readonly mesh: ServiceMeshProvider;
  readonly metricsEndpoint: MetricsEndpointProvider;
  readonly tracing: TracingEndpointRequirer;
  readonly peers: PeerStateStore;
  /** Readiness of the last waypoint wait, if any */
  readiness?: ReadinessWaiter;

  private readonly kubernetes: KubernetesClient;
  private readonly pebble: PebbleClient;
  private readonly waypointResources: KubernetesResourceManager;
  private readonly policyResources: PolicyResourceManager;

  constructor(
    backend: CharmBackend,
    private readonly options: IstioBeaconCharmOptions,
  ) {
    super(backend, options.logger ?? createConsoleLogger(CHARM_NAME));
    this.kubernetes = options.kubernetes;
    this.pebble = options.pebble;

    const { appName, name: modelName } = this.model;
    this.waypointResources = new KubernetesResourceManager(this.kubernetes, {
      labels: createCharmDefaultLabels(appName, modelName, 'istio-waypoint'),
      resourceTypes: [ResourceTypes.gateway, ResourceTypes.horizontalPodAutoscaler],
      namespace: modelName,
      logger: this.logger,
    });
    this.policyResources = new PolicyResourceManager({
      appName,
      modelName,
      client: this.kubernetes,
      logger: this.logger,
    });

    this.mesh = new ServiceMeshProvider(this, { labels: () => this.meshLabels() });
    this.metricsEndpoint = new MetricsEndpointProvider(this, {
      charmName: CHARM_NAME,
      jobs: [{ static_configs: [{ targets: [`*:${METRICS_PROXY_PORT}`] }] }],
    });
    this.tracing = new TracingEndpointRequirer(this);
    this.peers = new PeerStateStore(this);

    const sync = () => this.syncAllResources();
    const syncEvents: HookName[] = [
      'config-changed',
      'upgrade-charm',
      'leader-elected',
      `${METRICS_PROXY_CONTAINER}-pebble-ready`,
    ];
    for (const event of syncEvents) this.observe(event, sync);
    this.observeRelation(this.mesh.relationName, ['changed', 'departed', 'broken'], sync);
    this.observeRelation('peers', ['changed'], sync);
    this.observe('update-status', () => this.onUpdateStatus());
    this.observe('remove', () => this.onRemove());
  }

  // --- Naming ---

  get waypointName(): string {
    return waypointNameFor(this.model.appName, this.model.name);
  }

  /** Value of the managed-by namespace label */
  get managedBy(): string {
    return charmKubernetesLabel(this.model.appName, this.model.name);
  }

  /** Labels consumers put on their pods; none when the whole model is on the mesh. */
  meshLabels(): Record<string, string> {
    const config = this.tryConfig();
    if (!config || config.modelOnMesh) return {};
    return {
      [DATAPLANE_MODE_LABEL]: 'ambient',
      [USE_WAYPOINT_LABEL]: this.waypointName,
      [USE_WAYPOINT_NAMESPACE_LABEL]: this.model.name,
    };
  }

  // --- Event handlers ---

  async syncAllResources(): Promise<void> {
    const config = this.configOrBlock();
    if (!config) return;

    const proxyReady = await this.setupMetricsProxy();
    if (!this.model.isLeader()) {
      this.status = proxyReady
        ? Status.active('Backup unit; standing by for leader takeover')
        : Status.waiting(`Waiting for ${METRICS_PROXY_CONTAINER} container`);
      return;
    }

    this.status = Status.maintenance('Reconciling waypoint');
    await this.syncWaypointResources(config);
    await this.waitForWaypoint(config);
    await this.syncAuthorizationPolicies(config);
    await this.putCharmOnMesh(config);

    this.mesh.updateRelations();
    this.metricsEndpoint.setScrapeJobSpec();
    this.peers.publish({ waypoint: this.waypointName, modelOnMesh: config.modelOnMesh });

    this.status = proxyReady ? Status.active() : Status.waiting(`Waiting for ${METRICS_PROXY_CONTAINER} container`);
  }

  private async onUpdateStatus(): Promise<void> {
    const config = this.configOrBlock();
    if (!config || !this.model.isLeader()) return;
    this.status = (await this.isWaypointReady())
      ? Status.active()
      : Status.waiting(`Waiting for waypoint ${this.waypointName} to be ready`);
  }

  /** The last unit going away takes the model's mesh setup with it. */
  private async onRemove(): Promise<void> {
    if (this.model.plannedUnits() > 0) {
      this.logger.info('Other units remain, keeping waypoint and policies');
      return;
    }
    await this.waypointResources.delete({ ignoreMissing: true });
    await this.policyResources.delete({ ignoreMissing: true });
    try {
      await removeNamespaceLabels(this.namespaceLabelOptions());
    } catch (error) {
      if (!isNotFound(error)) throw error;
      this.logger.info(`Namespace ${this.model.name} already gone`);
    }
  }

  // --- Reconcilers ---

  private async setupMetricsProxy(): Promise<boolean> {
    if (!(await this.pebble.canConnect())) {
      this.logger.info(`${METRICS_PROXY_CONTAINER} container not reachable yet`);
      return false;
    }
    await this.pebble.addLayer(
      METRICS_PROXY_CONTAINER,
      metricsProxyLayer({ waypointName: this.waypointName, namespace: this.model.name }),
    );
    await this.pebble.replan();
    return true;
  }

  private async syncWaypointResources(config: BeaconConfig): Promise<void> {
    const name = this.waypointName;
    const namespace = this.model.name;
    // an HPA cannot pin zero replicas; a departing last unit is handled by remove
    const replicas = Math.max(1, this.model.plannedUnits());

    const resources = synthResources((chart) => {
      new Waypoint(chart, 'waypoint', { name, namespace });
      new WaypointAutoscaler(chart, 'waypoint-autoscaler', { name, gatewayName: name, replicas, namespace });
    });
    await this.waypointResources.reconcile(resources);

    if (config.modelOnMesh) {
      await addNamespaceLabels({ ...this.namespaceLabelOptions(), waypointName: name });
    } else {
      await removeNamespaceLabels(this.namespaceLabelOptions());
    }
  }

  private async waitForWaypoint(config: BeaconConfig): Promise<void> {
    this.readiness = new ReadinessWaiter(() => this.isWaypointReady(), {
      name: this.waypointName,
      timeoutSeconds: config.readyTimeoutSeconds,
      intervalSeconds: this.options.readinessIntervalSeconds,
    });
    this.status = Status.waiting(`Waiting for waypoint ${this.waypointName} to be ready`);
    await this.readiness.wait();
  }

  async isWaypointReady(): Promise<boolean> {
    try {
      const deployment = await this.kubernetes.get(
        refFor(ResourceTypes.deployment, this.waypointName, this.model.name),
      );
      const status = DeploymentStatusSchema.parse(deployment).status;
      const replicas = status?.replicas ?? 0;
      return replicas > 0 && (status?.readyReplicas ?? 0) >= replicas;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  private async syncAuthorizationPolicies(config: BeaconConfig): Promise<void> {
    const policies = config.manageAuthorizationPolicies ? this.mesh.meshInfo() : [];
    const rawPolicies = config.modelOnMesh ? [this.modelOperatorPolicy()] : [];
    await this.policyResources.reconcile(policies, rawPolicies);
  }

  modelOperatorPolicy(): AuthorizationPolicyConfig {
    return modelOperatorPolicy(this.model.appName, this.model.name);
  }

  private async putCharmOnMesh(config: BeaconConfig): Promise<void> {
    const { appName, name } = this.model;
    await reconcileCharmLabels({
      client: this.kubernetes,
      appName,
      namespace: name,
      configMapName: charmLabelsConfigMapName(appName),
      labels: config.modelOnMesh ? {} : { [DATAPLANE_MODE_LABEL]: 'ambient' },
    });
  }

  // --- Helpers ---

  private namespaceLabelOptions() {
    return {
      client: this.kubernetes,
      namespace: this.model.name,
      managedBy: this.managedBy,
      logger: this.logger,
    };
  }

  private tryConfig(): BeaconConfig | undefined {
    try {
      return parseBeaconConfig(this.model.config);
    } catch (error) {
      if (error instanceof ConfigError) return undefined;
      throw error;
    }
  }

  private configOrBlock(): BeaconConfig | undefined {
    try {
      return parseBeaconConfig(this.model.config);
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      this.logger.error(error.message);
      this.status = Status.blocked(error.message);
      return undefined;
    }
  }
}
