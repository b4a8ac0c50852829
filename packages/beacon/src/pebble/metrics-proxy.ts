import type { PebbleLayer } from './client';

export const METRICS_PROXY_CONTAINER = 'metrics-proxy';
export const METRICS_PROXY_PORT = 15090;

export interface MetricsProxyOptions {
  /** Waypoint whose pods are scraped */
  waypointName: string;
  namespace: string;
  port?: number;
}

/**
 * Layer for the metrics proxy, which scrapes the waypoint pods and serves
 * their merged metrics on one port.
 */
export function metricsProxyLayer(options: MetricsProxyOptions): PebbleLayer {
  return {
    summary: 'Metrics proxy layer',
    description: 'Aggregates waypoint proxy metrics for scraping',
    services: {
      'metrics-proxy': {
        override: 'replace',
        summary: 'metrics proxy',
        command: '/usr/bin/metrics-proxy',
        startup: 'enabled',
        environment: {
          POD_LABEL_SELECTOR: `gateway.networking.k8s.io/gateway-name=${options.waypointName}`,
          NAMESPACE: options.namespace,
          PORT: String(options.port ?? METRICS_PROXY_PORT),
        },
      },
    },
  };
}
