import * as kplus from 'cdk8s-plus-33';
import { z } from 'zod';
import { synthResources } from '../constructs';
import { isNotFound, ResourceTypes, refFor, type KubernetesClient, type KubernetesResource } from '../kubernetes';
import { jsonString } from './types';

export interface CharmLabelsOptions {
  client: KubernetesClient;
  appName: string;
  namespace: string;
  /** ConfigMap remembering which labels were put there by us */
  configMapName: string;
  labels: Record<string, string>;
}

const LabelStoreSchema = z.object({
  data: z.object({ labels: jsonString(z.record(z.string())) }),
});

/** ConfigMap name used to track the mesh labels of an app. */
export function charmLabelsConfigMapName(appName: string): string {
  return `juju-service-mesh-${appName}-labels`;
}

function labelStore(name: string, namespace: string): KubernetesResource {
  const [configMap] = synthResources((chart) => {
    new kplus.k8s.KubeConfigMap(chart, 'labels', {
      metadata: { name, namespace },
      data: { labels: '{}' },
    });
  });
  if (!configMap) throw new Error(`Failed to render ConfigMap ${name}`);
  return configMap;
}

async function readManagedLabels(options: CharmLabelsOptions): Promise<Record<string, string>> {
  const ref = refFor(ResourceTypes.configMap, options.configMapName, options.namespace);
  try {
    const parsed = LabelStoreSchema.safeParse(await options.client.get(ref));
    return parsed.success ? parsed.data.data.labels : {};
  } catch (error) {
    if (!isNotFound(error)) throw error;
    await options.client.create(labelStore(options.configMapName, options.namespace));
    return {};
  }
}

/**
 * Puts `labels` on the app's StatefulSet pod template and Service.
 *
 * Labels set by an earlier call but no longer wanted are removed; labels
 * this function never set are left alone.
 */
export async function reconcileCharmLabels(options: CharmLabelsOptions): Promise<void> {
  const { client, appName, namespace, labels } = options;
  const previous = await readManagedLabels(options);

  const patch: Record<string, string | null> = {};
  for (const key of Object.keys(previous)) {
    if (!(key in labels)) patch[key] = null;
  }
  Object.assign(patch, labels);

  await client.patch(refFor(ResourceTypes.statefulSet, appName, namespace), {
    spec: { template: { metadata: { labels: patch } } },
  });
  await client.patch(refFor(ResourceTypes.service, appName, namespace), {
    metadata: { labels: patch },
  });
  await client.patch(refFor(ResourceTypes.configMap, options.configMapName, namespace), {
    data: { labels: JSON.stringify(labels) },
  });
}
