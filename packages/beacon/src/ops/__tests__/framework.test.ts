import { beforeEach, describe, expect, it } from 'vitest';
import { noopLogger } from '../../core';
import { InMemoryBackend } from '../../testing';
import { CharmBase, parseRelationEvent, type CharmEvent } from '../framework';

class RecordingCharm extends CharmBase {
  readonly seen: string[] = [];

  record(label: string) {
    return (event: CharmEvent) => {
      const relations = this.model.relations('db').map((relation) => relation.id);
      this.seen.push(`${label}:${event.name}:${event.relation?.id ?? '-'}:[${relations.join(',')}]`);
    };
  }
}

describe('parseRelationEvent', () => {
  it('splits endpoint and kind', () => {
    expect(parseRelationEvent('service-mesh-relation-changed')).toEqual({ endpoint: 'service-mesh', kind: 'changed' });
    expect(parseRelationEvent('require-cmr-mesh-relation-broken')).toEqual({
      endpoint: 'require-cmr-mesh',
      kind: 'broken',
    });
  });

  it('ignores other hooks', () => {
    expect(parseRelationEvent('config-changed')).toBeUndefined();
    expect(parseRelationEvent('metrics-proxy-pebble-ready')).toBeUndefined();
  });
});

describe('CharmBase', () => {
  let backend: InMemoryBackend;
  let charm: RecordingCharm;
  let first: number;
  let second: number;

  beforeEach(() => {
    backend = new InMemoryBackend({ appName: 'app' });
    first = backend.addRelation({ endpoint: 'db', remoteApp: 'postgres' });
    second = backend.addRelation({ endpoint: 'db', remoteApp: 'mysql' });
    charm = new RecordingCharm(backend, noopLogger);
  });

  it('runs handlers in registration order', async () => {
    charm.observe('config-changed', charm.record('a'));
    charm.observe('config-changed', charm.record('b'));

    await charm.dispatch('config-changed');

    expect(charm.seen).toEqual(['a:config-changed:-:[0,1]', 'b:config-changed:-:[0,1]']);
  });

  it('hands relation events their relation', async () => {
    charm.observeRelation('db', ['changed', 'departed'], charm.record('h'));

    await charm.dispatch('db-relation-changed', { relationId: second });

    expect(charm.seen).toEqual(['h:db-relation-changed:1:[0,1]']);
  });

  it('leaves the broken relation out of the model while its hook runs', async () => {
    charm.observeRelation('db', ['broken'], charm.record('h'));
    charm.observe('config-changed', charm.record('c'));

    await charm.dispatch('db-relation-broken', { relationId: first });
    await charm.dispatch('config-changed');

    expect(charm.seen).toEqual(['h:db-relation-broken:0:[1]', 'c:config-changed:-:[0,1]']);
  });

  it('fails the hook when a handler throws', async () => {
    charm.observe('install', () => {
      throw new Error('boom');
    });
    charm.observe('install', charm.record('after'));

    await expect(charm.dispatch('install')).rejects.toThrow('boom');
    expect(charm.seen).toEqual([]);
  });

  it('ignores events nobody observes', async () => {
    await charm.dispatch('stop');

    expect(charm.seen).toEqual([]);
  });
});
