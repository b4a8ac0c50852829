/**
 * ServiceMeshTesterCharm - Echo server that joins the mesh as a consumer.
 *
 * Apps related over `inbound` are allowed in: HTTP GET/POST on the first
 * port, plain TCP on the second. Apps related over `outbound` tell us
 * where to send traffic.
 */
import { z } from 'zod';
import {
  appPolicy,
  CharmBase,
  ConfigError,
  createConsoleLogger,
  jsonString,
  PebbleError,
  ServiceMeshConsumer,
  Status,
  unitPolicy,
  type CharmBackend,
  type KubernetesClient,
  type Logger,
  type PebbleClient,
} from 'istio-beacon';
import { ECHO_SERVER_CONTAINER, ECHO_SERVER_PORTS, echoServerLayer, HTTP_PORT, TCP_PORT } from './echo-server';

export const TESTER_NAME = 'service-mesh-tester';

const TesterConfigSchema = z.object({
  'auto-join-mesh': z.boolean().default(true),
});

const ServiceDataSchema = z.object({
  name: z.string().min(1),
  namespace: z.string().min(1),
  ports: jsonString(z.array(z.number().int())),
});

export interface ServiceMeshTesterOptions {
  /** Pebble of the echo-server container */
  pebble: PebbleClient;
  /** Needed to label our own pods when auto-join-mesh is on */
  kubernetes?: KubernetesClient;
  logger?: Logger;
}

export class ServiceMeshTesterCharm extends CharmBase {
  readonly mesh: ServiceMeshConsumer;
  private readonly pebble: PebbleClient;

  constructor(backend: CharmBackend, options: ServiceMeshTesterOptions) {
    super(backend, options.logger ?? createConsoleLogger(TESTER_NAME));
    this.pebble = options.pebble;

    const config = TesterConfigSchema.safeParse(this.model.config);
    if (!config.success) throw new ConfigError(`invalid config: ${config.error.issues[0]?.message ?? 'unknown'}`);

    this.mesh = new ServiceMeshConsumer(this, {
      policies: [
        appPolicy({
          relation: 'inbound',
          endpoints: [{ ports: [HTTP_PORT], methods: ['GET', 'POST'], paths: ['/foo', '/bar/'] }],
        }),
        unitPolicy({ relation: 'inbound', ports: [TCP_PORT] }),
      ],
      autoJoin: config.data['auto-join-mesh'],
      kubernetes: options.kubernetes,
    });

    this.observe(`${ECHO_SERVER_CONTAINER}-pebble-ready`, () => this.onPebbleReady());
    this.observeRelation('inbound', ['created', 'changed'], () => this.publishInbound());
    this.observeRelation('outbound', ['changed'], () => {
      for (const target of this.outboundTargets()) this.logger.info(`Outbound target ${target}`);
    });
    this.observeRelation('service-mesh', ['changed', 'broken'], () => this.updateStatus());
    this.observe('update-status', () => this.updateStatus());
  }

  private async onPebbleReady(): Promise<void> {
    if (!(await this.pebble.canConnect())) {
      throw new PebbleError(`${ECHO_SERVER_CONTAINER} not reachable during pebble-ready`);
    }
    await this.pebble.addLayer(ECHO_SERVER_CONTAINER, echoServerLayer());
    await this.pebble.replan();
    this.updateStatus();
  }

  /** Tells inbound apps where to reach us. Leader only. */
  publishInbound(): void {
    if (!this.model.isLeader()) return;
    for (const relation of this.model.relations('inbound')) {
      relation.updateLocalAppData({
        name: this.model.appName,
        namespace: this.model.name,
        ports: JSON.stringify(ECHO_SERVER_PORTS),
      });
    }
  }

  /** In-cluster URLs of every app related over outbound that has published itself. */
  outboundTargets(): string[] {
    const targets: string[] = [];
    for (const relation of this.model.relations('outbound')) {
      const parsed = ServiceDataSchema.safeParse(relation.remoteAppData());
      if (!parsed.success) {
        this.logger.debug(`outbound relation ${relation.id} has no service data yet`);
        continue;
      }
      const { name, namespace, ports } = parsed.data;
      for (const port of ports) targets.push(`http://${name}.${namespace}.svc.cluster.local:${port}`);
    }
    return targets;
  }

  updateStatus(): void {
    const meshRelations = this.model.relations('service-mesh');
    if (meshRelations.length > 1) {
      this.status = Status.blocked('Too many related applications on service-mesh');
    } else if (meshRelations.length === 1 && !this.mesh.providerData()) {
      this.status = Status.waiting('Waiting for service mesh data');
    } else {
      this.status = Status.active('Echo server running');
    }
  }
}
