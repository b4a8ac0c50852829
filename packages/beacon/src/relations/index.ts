export { MetricsEndpointProvider } from './metrics-endpoint';
export type { MetricsEndpointProviderOptions, ScrapeJob, StaticScrapeConfig } from './metrics-endpoint';
export { PeerStateStore } from './peers';
export type { PeerState } from './peers';
export { TracingEndpointRequirer } from './tracing';
export type { ReceiverProtocol, TracingEndpointRequirerOptions } from './tracing';
