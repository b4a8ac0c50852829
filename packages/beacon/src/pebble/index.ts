export { SocketPebbleClient } from './client';
export type { PebbleClient, PebbleLayer, PebbleService, SocketPebbleClientOptions } from './client';
export { METRICS_PROXY_CONTAINER, METRICS_PROXY_PORT, metricsProxyLayer } from './metrics-proxy';
export type { MetricsProxyOptions } from './metrics-proxy';
