import type { Logger } from '../core';
import { refFor, ResourceTypes, type KubernetesClient } from '../kubernetes';

export const USE_WAYPOINT_LABEL = 'istio.io/use-waypoint';
export const USE_WAYPOINT_NAMESPACE_LABEL = 'istio.io/use-waypoint-namespace';
export const DATAPLANE_MODE_LABEL = 'istio.io/dataplane-mode';
export const WAYPOINT_MANAGED_BY_LABEL = 'charms.canonical.com/istio.io.waypoint.managed-by';

export interface NamespaceLabelOptions {
  client: KubernetesClient;
  namespace: string;
  waypointName: string;
  /** Owner marker, `<app>-<model>` */
  managedBy: string;
  logger: Logger;
}

async function namespaceLabels(client: KubernetesClient, namespace: string): Promise<Record<string, string>> {
  const ns = await client.get(refFor(ResourceTypes.namespace, namespace));
  return ns.metadata.labels ?? {};
}

/**
 * Enrols every pod of the namespace in ambient mode behind our waypoint.
 * Returns false when someone else already owns the namespace's mesh labels.
 */
export async function addNamespaceLabels(options: NamespaceLabelOptions): Promise<boolean> {
  const { client, namespace, waypointName, managedBy, logger } = options;
  const labels = await namespaceLabels(client, namespace);

  const claimed = labels[USE_WAYPOINT_LABEL] !== undefined || labels[DATAPLANE_MODE_LABEL] !== undefined;
  if (claimed && labels[WAYPOINT_MANAGED_BY_LABEL] !== managedBy) {
    logger.warn(`Namespace ${namespace} already has mesh labels not managed by ${managedBy}, leaving them alone`);
    return false;
  }

  await client.patch(refFor(ResourceTypes.namespace, namespace), {
    metadata: {
      labels: {
        [USE_WAYPOINT_LABEL]: waypointName,
        [DATAPLANE_MODE_LABEL]: 'ambient',
        [WAYPOINT_MANAGED_BY_LABEL]: managedBy,
      },
    },
  });
  return true;
}

/** Removes the namespace labels, but only the ones we put there. */
export async function removeNamespaceLabels(options: Omit<NamespaceLabelOptions, 'waypointName'>): Promise<boolean> {
  const { client, namespace, managedBy, logger } = options;
  const labels = await namespaceLabels(client, namespace);
  if (labels[WAYPOINT_MANAGED_BY_LABEL] !== managedBy) {
    logger.debug(`Namespace ${namespace} mesh labels are not managed by ${managedBy}`);
    return false;
  }

  await client.patch(refFor(ResourceTypes.namespace, namespace), {
    metadata: {
      labels: {
        [USE_WAYPOINT_LABEL]: null,
        [DATAPLANE_MODE_LABEL]: null,
        [WAYPOINT_MANAGED_BY_LABEL]: null,
      },
    },
  });
  return true;
}
