/**
 * Dispatch command - Run the current Juju hook against a charm
 *
 * Juju execs the charm's `dispatch` script with JUJU_DISPATCH_PATH set to
 * the hook being run (`hooks/config-changed`, ...).
 */
import * as path from 'node:path';
import {
  CharmBase,
  IstioBeaconCharm,
  METRICS_PROXY_CONTAINER,
  NodeKubernetesClient,
  SocketPebbleClient,
  type CharmBackend,
  type KubernetesClient,
  type Logger,
  type PebbleClient,
} from 'istio-beacon';
import { ECHO_SERVER_CONTAINER, ServiceMeshTesterCharm } from 'service-mesh-tester';
import { createJujuLogger, hookEnvironment, HookToolsBackend } from '../hook-tools';

export type CharmKind = 'beacon' | 'mesh-tester';

export interface DispatchOptions {
  charm?: CharmKind;
}

export interface HookContext {
  hook: string;
  relationId?: number;
}

export interface CharmServices {
  kubernetes: KubernetesClient;
  pebble: (container: string) => PebbleClient;
  logger: Logger;
}

export function hookFromEnv(env: NodeJS.ProcessEnv = process.env): HookContext {
  const dispatchPath = env.JUJU_DISPATCH_PATH;
  if (!dispatchPath) {
    throw new Error('JUJU_DISPATCH_PATH is not set; dispatch only runs inside a Juju hook');
  }
  const relation = env.JUJU_RELATION_ID;
  if (!relation) return { hook: path.basename(dispatchPath) };

  const relationId = Number(relation.split(':').pop());
  if (!Number.isInteger(relationId)) throw new Error(`Malformed JUJU_RELATION_ID: ${relation}`);
  return { hook: path.basename(dispatchPath), relationId };
}

export function createCharm(kind: CharmKind, backend: CharmBackend, services: CharmServices): CharmBase {
  switch (kind) {
    case 'beacon':
      return new IstioBeaconCharm(backend, {
        kubernetes: services.kubernetes,
        pebble: services.pebble(METRICS_PROXY_CONTAINER),
        logger: services.logger,
      });
    case 'mesh-tester':
      return new ServiceMeshTesterCharm(backend, {
        kubernetes: services.kubernetes,
        pebble: services.pebble(ECHO_SERVER_CONTAINER),
        logger: services.logger,
      });
  }
}

export async function dispatch(options: DispatchOptions): Promise<void> {
  const { hook, relationId } = hookFromEnv();
  const logger = createJujuLogger();
  const backend = new HookToolsBackend(hookEnvironment());

  const charm = createCharm(options.charm ?? 'beacon', backend, {
    kubernetes: new NodeKubernetesClient(),
    pebble: (container) => SocketPebbleClient.forContainer(container),
    logger,
  });

  logger.debug(`Dispatching ${hook}${relationId === undefined ? '' : ` for relation ${relationId}`}`);
  await charm.dispatch(hook, { relationId });
}
