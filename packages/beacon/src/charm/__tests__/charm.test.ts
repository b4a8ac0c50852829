import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { noopLogger, WaypointNotReadyError } from '../../core';
import type { KubernetesResource } from '../../kubernetes';
import { loadCharmMetadata, relationEndpoints } from '../../ops';
import { FakeKubernetesClient, FakePebbleClient, InMemoryBackend } from '../../testing';
import { IstioBeaconCharm } from '../charm';

const APP = 'istio-beacon-k8s';
const MODEL = 'istio-system';
const WAYPOINT = 'istio-beacon-k8s-istio-system-waypoint';

const metadata = loadCharmMetadata(new URL('../../../charmcraft.yaml', import.meta.url));

function waypointDeployment(readyReplicas: number): KubernetesResource {
  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: { name: WAYPOINT, namespace: MODEL },
    status: { replicas: 1, readyReplicas },
  };
}

function cluster(readyReplicas = 1): FakeKubernetesClient {
  return new FakeKubernetesClient([
    { apiVersion: 'v1', kind: 'Namespace', metadata: { name: MODEL } },
    {
      apiVersion: 'apps/v1',
      kind: 'StatefulSet',
      metadata: { name: APP, namespace: MODEL },
      spec: { template: { metadata: { labels: { 'app.kubernetes.io/name': APP } } } },
    },
    { apiVersion: 'v1', kind: 'Service', metadata: { name: APP, namespace: MODEL } },
    waypointDeployment(readyReplicas),
  ]);
}

const policyFromReceiver = {
  source_app_name: 'sender',
  source_namespace: MODEL,
  target_app_name: 'receiver',
  target_namespace: MODEL,
  target_service: null,
  target_selector_labels: null,
  target_type: 'app',
  endpoints: [{ hosts: null, ports: [8080], methods: ['GET'], paths: null }],
};

describe('IstioBeaconCharm', () => {
  let backend: InMemoryBackend;
  let client: FakeKubernetesClient;
  let pebble: FakePebbleClient;

  const charm = () => new IstioBeaconCharm(backend, { kubernetes: client, pebble, logger: noopLogger });
  const ref = (kind: string, apiVersion: string, name: string, namespace?: string) =>
    client.find({ apiVersion, kind, name, namespace });

  beforeEach(() => {
    backend = new InMemoryBackend({ metadata, appName: APP, modelName: MODEL, leader: true });
    client = cluster();
    pebble = new FakePebbleClient();
  });

  it('declares exactly the service-mesh, metrics-endpoint and charm-tracing endpoints', () => {
    expect(relationEndpoints(metadata).sort()).toEqual(['charm-tracing', 'metrics-endpoint', 'service-mesh']);
    expect(metadata.requires['charm-tracing']?.limit).toBe(1);
  });

  it('does nothing on start', async () => {
    await charm().dispatch('start');

    expect(backend.getStatus()).toEqual({ name: 'unknown', message: '' });
  });

  describe('with the default configuration', () => {
    it('deploys the waypoint with one replica and goes active', async () => {
      await charm().dispatch('config-changed');

      const gateway = ref('Gateway', 'gateway.networking.k8s.io/v1', WAYPOINT, MODEL);
      expect(gateway?.metadata.labels).toEqual({
        'istio.io/waypoint-for': 'service',
        'app.kubernetes.io/instance': 'istio-beacon-k8s-istio-system',
        'kubernetes-resource-handler-scope': 'istio-waypoint',
      });
      expect(gateway?.spec).toEqual({
        gatewayClassName: 'istio-waypoint',
        listeners: [{ name: 'mesh', port: 15008, protocol: 'HBONE', allowedRoutes: { namespaces: { from: 'Same' } } }],
      });

      const hpa = ref('HorizontalPodAutoscaler', 'autoscaling/v2', WAYPOINT, MODEL);
      expect(hpa?.spec).toEqual({
        scaleTargetRef: { apiVersion: 'gateway.networking.k8s.io/v1', kind: 'Gateway', name: WAYPOINT },
        minReplicas: 1,
        maxReplicas: 1,
      });

      expect(backend.getStatus()).toEqual({ name: 'active', message: '' });
    });

    it('keeps the model off the mesh and manages no policies without relations', async () => {
      await charm().dispatch('config-changed');

      expect(ref('Namespace', 'v1', MODEL)?.metadata.labels).toBeUndefined();
      expect(client.all('AuthorizationPolicy')).toEqual([]);
      expect(ref('Service', 'v1', APP, MODEL)?.metadata.labels).toEqual({ 'istio.io/dataplane-mode': 'ambient' });
    });

    it('starts the metrics proxy against the waypoint pods', async () => {
      await charm().dispatch('metrics-proxy-pebble-ready');

      expect(pebble.layers.get('metrics-proxy')?.services['metrics-proxy']?.environment).toEqual({
        POD_LABEL_SELECTOR: `gateway.networking.k8s.io/gateway-name=${WAYPOINT}`,
        NAMESPACE: MODEL,
        PORT: '15090',
      });
      expect(pebble.replans).toBe(1);
    });
  });

  it('pins the waypoint replicas to the planned units', async () => {
    backend.setPlannedUnits(3);

    await charm().dispatch('config-changed');

    expect(ref('HorizontalPodAutoscaler', 'autoscaling/v2', WAYPOINT, MODEL)?.spec).toMatchObject({
      minReplicas: 3,
      maxReplicas: 3,
    });
  });

  describe('service-mesh relation', () => {
    let relationId: number;

    beforeEach(() => {
      relationId = backend.addRelation({
        endpoint: 'service-mesh',
        remoteApp: 'receiver',
        remoteAppData: { policies: JSON.stringify([policyFromReceiver]) },
      });
    });

    it('renders the requested policies and publishes the mesh labels', async () => {
      await charm().dispatch('service-mesh-relation-changed', { relationId });

      const policies = client.all('AuthorizationPolicy');
      expect(policies).toHaveLength(1);
      expect(policies[0]?.metadata.name).toMatch(
        /^istio-beacon-k8s-istio-system-policy-sender-istio-system-receiver-[0-9a-f]{8}$/,
      );

      const data = backend.localAppData(relationId);
      expect(JSON.parse(data.labels ?? 'null')).toEqual({
        'istio.io/dataplane-mode': 'ambient',
        'istio.io/use-waypoint': WAYPOINT,
        'istio.io/use-waypoint-namespace': MODEL,
      });
      expect(data.mesh_type).toBe('"istio"');
    });

    it('removes relation policies when policy management is off', async () => {
      await charm().dispatch('service-mesh-relation-changed', { relationId });
      backend.setConfig({ 'manage-authorization-policies': false });

      await charm().dispatch('config-changed');

      expect(client.all('AuthorizationPolicy')).toEqual([]);
    });

    it('drops the policies of a relation being broken', async () => {
      await charm().dispatch('service-mesh-relation-changed', { relationId });

      await charm().dispatch('service-mesh-relation-broken', { relationId });

      expect(client.all('AuthorizationPolicy')).toEqual([]);
    });
  });

  describe('with model-on-mesh', () => {
    beforeEach(() => {
      backend.setConfig({ 'model-on-mesh': true });
    });

    it('labels the namespace and lets everything reach the model operator', async () => {
      await charm().dispatch('config-changed');

      expect(ref('Namespace', 'v1', MODEL)?.metadata.labels).toEqual({
        'istio.io/use-waypoint': WAYPOINT,
        'istio.io/dataplane-mode': 'ambient',
        'charms.canonical.com/istio.io.waypoint.managed-by': 'istio-beacon-k8s-istio-system',
      });

      const operatorPolicy = ref(
        'AuthorizationPolicy',
        'security.istio.io/v1',
        'istio-beacon-k8s-istio-system-policy-all-sources-modeloperator',
        MODEL,
      );
      expect(operatorPolicy?.spec).toEqual({
        action: 'ALLOW',
        selector: { matchLabels: { 'operator.juju.is/name': 'modeloperator' } },
        rules: [{ to: [{ operation: { ports: ['17071'] } }] }],
      });
    });

    it('asks consumers for no pod labels', async () => {
      const relationId = backend.addRelation({ endpoint: 'service-mesh', remoteApp: 'receiver' });

      await charm().dispatch('service-mesh-relation-changed', { relationId });

      expect(backend.localAppData(relationId).labels).toBe('{}');
    });

    it('removes the namespace labels when switched off again', async () => {
      await charm().dispatch('config-changed');
      backend.setConfig({ 'model-on-mesh': false });

      await charm().dispatch('config-changed');

      expect(ref('Namespace', 'v1', MODEL)?.metadata.labels).toEqual({});
      expect(client.all('AuthorizationPolicy')).toEqual([]);
    });
  });

  describe('waypoint readiness', () => {
    beforeEach(() => {
      vi.useFakeTimers();
      client = cluster(0);
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('fails the hook once ready-timeout has passed', async () => {
      backend.setConfig({ 'ready-timeout': 150 });
      const beacon = charm();

      const outcome = expect(beacon.dispatch('config-changed')).rejects.toThrow(
        new WaypointNotReadyError(WAYPOINT, 150),
      );
      await vi.advanceTimersByTimeAsync(149_000);
      expect(beacon.readiness?.state).toBe('pending');

      await vi.advanceTimersByTimeAsync(1_000);
      await outcome;
      expect(beacon.readiness?.state).toBe('failed-timeout');
      expect(client.all('AuthorizationPolicy')).toEqual([]);
    });

    it('goes active once the waypoint becomes ready in time', async () => {
      const beacon = charm();

      const dispatching = beacon.dispatch('config-changed');
      await vi.advanceTimersByTimeAsync(20_000);
      client.seed(waypointDeployment(1));
      await vi.advanceTimersByTimeAsync(5_000);
      await dispatching;

      expect(beacon.readiness?.state).toBe('ready');
      expect(backend.getStatus()).toEqual({ name: 'active', message: '' });
    });

    it('reports waiting on update-status while the waypoint is not ready', async () => {
      await charm().dispatch('update-status');

      expect(backend.getStatus()).toEqual({ name: 'waiting', message: `Waiting for waypoint ${WAYPOINT} to be ready` });
    });
  });

  it('blocks on invalid configuration without touching the cluster', async () => {
    backend.setConfig({ 'ready-timeout': -1 });

    await charm().dispatch('config-changed');

    expect(backend.getStatus()).toEqual({
      name: 'blocked',
      message: 'invalid config: ready-timeout: Number must be greater than 0',
    });
    expect(client.calls).toEqual([]);
  });

  it('waits for the metrics-proxy container', async () => {
    pebble.connectable = false;

    await charm().dispatch('config-changed');

    expect(backend.getStatus()).toEqual({ name: 'waiting', message: 'Waiting for metrics-proxy container' });
    expect(ref('Gateway', 'gateway.networking.k8s.io/v1', WAYPOINT, MODEL)).toBeDefined();
  });

  it('stands by on non-leader units', async () => {
    backend.setLeader(false);

    await charm().dispatch('config-changed');

    expect(backend.getStatus()).toEqual({ name: 'active', message: 'Backup unit; standing by for leader takeover' });
    expect(client.callsOf('apply')).toEqual([]);
    expect(pebble.replans).toBe(1);
  });

  it('publishes scrape jobs for the metrics proxy', async () => {
    const relationId = backend.addRelation({ endpoint: 'metrics-endpoint', remoteApp: 'prometheus' });

    await charm().dispatch('config-changed');

    const data = backend.localAppData(relationId);
    expect(JSON.parse(data.scrape_jobs ?? 'null')).toEqual([{ static_configs: [{ targets: ['*:15090'] }] }]);
    expect(JSON.parse(data.scrape_metadata ?? 'null')).toMatchObject({ application: APP, charm_name: APP });
    expect(backend.localUnitData(relationId)).toEqual({
      prometheus_scrape_unit_address: '10.1.0.10',
      prometheus_scrape_unit_name: `${APP}/0`,
    });
  });

  it('shares the waypoint name with its peers', async () => {
    const relationId = backend.addRelation({ endpoint: 'peers', remoteApp: APP });

    await charm().dispatch('config-changed');

    expect(backend.localAppData(relationId)).toEqual({ waypoint: WAYPOINT, 'model-on-mesh': 'false' });
  });

  describe('remove', () => {
    beforeEach(async () => {
      backend.setConfig({ 'model-on-mesh': true });
      await charm().dispatch('config-changed');
    });

    it('tears everything down when the last unit goes', async () => {
      backend.setPlannedUnits(0);
      backend.setLeader(false);

      await charm().dispatch('remove');

      expect(client.all('Gateway')).toEqual([]);
      expect(client.all('HorizontalPodAutoscaler')).toEqual([]);
      expect(client.all('AuthorizationPolicy')).toEqual([]);
      expect(ref('Namespace', 'v1', MODEL)?.metadata.labels).toEqual({});
    });

    it('keeps everything while other units remain', async () => {
      backend.setPlannedUnits(1);

      await charm().dispatch('remove');

      expect(client.all('Gateway')).toHaveLength(1);
      expect(client.all('AuthorizationPolicy')).toHaveLength(1);
    });
  });
});
