import { App, Chart, type ChartProps } from 'cdk8s';
import { z } from 'zod';
import { KubernetesResourceSchema, type KubernetesResource } from '../kubernetes';

/**
 * Builds constructs into a throwaway chart and returns the synthesized
 * objects, ready for the Kubernetes client.
 */
export function synthResources(build: (chart: Chart) => void, props: ChartProps = {}): KubernetesResource[] {
  const app = new App();
  const chart = new Chart(app, 'resources', { disableResourceNameHashes: true, ...props });
  build(chart);
  return z.array(KubernetesResourceSchema).parse(chart.toJson());
}
