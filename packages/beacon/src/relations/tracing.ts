import { z } from 'zod';
import type { CharmBase } from '../ops';
import { jsonString } from '../service-mesh';

export type ReceiverProtocol = 'otlp_http' | 'otlp_grpc' | 'zipkin' | 'jaeger_thrift_http';

const ReceiversSchema = jsonString(
  z.array(
    z.object({
      protocol: z.object({ name: z.string(), type: z.string() }),
      url: z.string(),
    }),
  ),
);

export interface TracingEndpointRequirerOptions {
  /** Defaults to charm-tracing */
  relationName?: string;
  /** Defaults to otlp_http */
  protocols?: ReceiverProtocol[];
}

/** Requirer side of `tracing`: asks for receivers and reads their URLs back. */
export class TracingEndpointRequirer {
  readonly relationName: string;
  private readonly protocols: ReceiverProtocol[];

  constructor(
    private readonly charm: CharmBase,
    options: TracingEndpointRequirerOptions = {},
  ) {
    this.relationName = options.relationName ?? 'charm-tracing';
    this.protocols = options.protocols ?? ['otlp_http'];
    charm.observeRelation(this.relationName, ['created', 'joined'], () => this.requestProtocols());
    charm.observeRelation(this.relationName, ['changed'], () => {
      const url = this.endpoint();
      if (url) charm.logger.info(`Tracing endpoint available at ${url}`);
    });
  }

  requestProtocols(): void {
    if (!this.charm.model.isLeader()) return;
    for (const relation of this.charm.model.relations(this.relationName)) {
      relation.updateLocalAppData({ receivers: JSON.stringify(this.protocols) });
    }
  }

  /** URL of the receiver for `protocol`, once the tracing backend has published it. */
  endpoint(protocol: ReceiverProtocol = 'otlp_http'): string | undefined {
    const relation = this.charm.model.relation(this.relationName);
    if (!relation) return undefined;
    const parsed = ReceiversSchema.safeParse(relation.remoteAppData().receivers);
    if (!parsed.success) return undefined;
    return parsed.data.find((receiver) => receiver.protocol.name === protocol)?.url;
  }
}
