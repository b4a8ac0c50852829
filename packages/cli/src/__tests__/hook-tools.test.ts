import { describe, expect, it } from 'vitest';
import * as yaml from 'yaml';
import { createJujuLogger, hookEnvironment, HookToolsBackend, type HookToolRunner } from '../hook-tools';

interface Invocation {
  tool: string;
  args: string[];
  input?: string;
}

function fakeTools(outputs: Record<string, string>): { run: HookToolRunner; invocations: Invocation[] } {
  const invocations: Invocation[] = [];
  const run: HookToolRunner = (tool, args, input) => {
    invocations.push({ tool, args, input });
    return outputs[[tool, ...args].join(' ')] ?? '';
  };
  return { run, invocations };
}

const environment = { unitName: 'istio-beacon-k8s/1', modelName: 'istio-system', modelUuid: 'uuid-1' };

describe('hookEnvironment', () => {
  it('reads unit and model from the hook environment', () => {
    expect(
      hookEnvironment({ JUJU_UNIT_NAME: 'app/0', JUJU_MODEL_NAME: 'dev', JUJU_MODEL_UUID: 'abc' }),
    ).toEqual({ unitName: 'app/0', modelName: 'dev', modelUuid: 'abc' });
  });

  it('refuses to run outside a hook', () => {
    expect(() => hookEnvironment({})).toThrow();
  });
});

describe('HookToolsBackend', () => {
  it('derives the app from the unit name', () => {
    const backend = new HookToolsBackend(environment, fakeTools({}).run);

    expect(backend.appName).toBe('istio-beacon-k8s');
    expect(backend.unitName).toBe('istio-beacon-k8s/1');
  });

  it('reads leadership and config as json', () => {
    const { run } = fakeTools({
      'is-leader --format=json': 'true\n',
      'config-get --format=json': '{"model-on-mesh": true, "ready-timeout": 100}\n',
    });
    const backend = new HookToolsBackend(environment, run);

    expect(backend.isLeader()).toBe(true);
    expect(backend.config()).toEqual({ 'model-on-mesh': true, 'ready-timeout': 100 });
  });

  it('counts planned units without dying ones', () => {
    const { run } = fakeTools({
      'goal-state --format=json': JSON.stringify({
        units: { 'app/0': { status: 'active' }, 'app/1': { status: 'dying' }, 'app/2': { status: 'waiting' } },
      }),
    });

    expect(new HookToolsBackend(environment, run).plannedUnits()).toBe(2);
  });

  it('lists relations with their remote app and units', () => {
    const { run } = fakeTools({
      'relation-ids service-mesh --format=json': '["service-mesh:3","service-mesh:7"]',
      'relation-list -r service-mesh:3 --format=json': '["receiver/0","receiver/1"]',
      'relation-list -r service-mesh:3 --app --format=json': '"receiver"',
    });
    const backend = new HookToolsBackend(environment, run);

    expect(backend.relationIds('service-mesh')).toEqual([3, 7]);
    expect(backend.relationInfo('service-mesh', 3)).toEqual({
      id: 3,
      endpoint: 'service-mesh',
      remoteApp: 'receiver',
      remoteUnits: ['receiver/0', 'receiver/1'],
    });
  });

  it('reads app and unit buckets', () => {
    const { run } = fakeTools({
      'relation-get -r service-mesh:3 - receiver --app --format=json': '{"policies":"[]"}',
      'relation-get -r service-mesh:3 - receiver/0 --format=json': 'null',
    });
    const backend = new HookToolsBackend(environment, run);

    expect(backend.relationGet('service-mesh', 3, 'receiver', true)).toEqual({ policies: '[]' });
    expect(backend.relationGet('service-mesh', 3, 'receiver/0', false)).toEqual({});
  });

  it('writes relation data as yaml on stdin', () => {
    const { run, invocations } = fakeTools({});

    new HookToolsBackend(environment, run).relationSet('service-mesh', 3, { mesh_type: '"istio"' }, true);

    expect(invocations.map(({ tool, args }) => [tool, ...args])).toEqual([
      ['relation-set', '-r', 'service-mesh:3', '--app', '--file', '-'],
    ]);
    expect(yaml.parse(invocations[0]?.input ?? '')).toEqual({ mesh_type: '"istio"' });
  });

  it('takes the first ingress address', () => {
    const { run } = fakeTools({
      'network-get metrics-endpoint --format=json': '{"bind-addresses":[],"ingress-addresses":["10.1.2.3","10.1.2.4"]}',
    });

    expect(new HookToolsBackend(environment, run).bindAddress('metrics-endpoint')).toBe('10.1.2.3');
  });

  it('sets and reads unit status', () => {
    const { run, invocations } = fakeTools({
      'status-get --include-data --format=json': '{"status":"waiting","message":"Waiting for waypoint","status-data":{}}',
    });
    const backend = new HookToolsBackend(environment, run);

    backend.setStatus({ name: 'blocked', message: 'invalid config' });
    backend.setStatus({ name: 'unknown', message: '' });

    expect(invocations).toEqual([{ tool: 'status-set', args: ['blocked', 'invalid config'], input: undefined }]);
    expect(backend.getStatus()).toEqual({ name: 'waiting', message: 'Waiting for waypoint' });
  });
});

describe('createJujuLogger', () => {
  it('maps levels onto juju-log', () => {
    const { run, invocations } = fakeTools({});
    const logger = createJujuLogger(run);

    logger.warn('careful');
    logger.debug('details');

    expect(invocations.map((i) => i.args)).toEqual([
      ['--log-level', 'WARNING', 'careful'],
      ['--log-level', 'DEBUG', 'details'],
    ]);
  });
});
