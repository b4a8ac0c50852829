import { z } from 'zod';
import { errorMessage } from '../core';
import type { CharmBase } from '../ops';
import { jsonString, meshPolicyFromWire, type MeshPolicy, type MeshType } from './types';

export interface ServiceMeshProviderOptions {
  /** Labels consumers should put on their pods to join the mesh */
  labels: () => Record<string, string>;
  /** Defaults to istio */
  meshType?: MeshType;
  /** Defaults to service-mesh */
  relationName?: string;
}

const PoliciesSchema = jsonString(z.array(z.unknown()));

/** Provider side of the `service_mesh` interface. */
export class ServiceMeshProvider {
  readonly relationName: string;

  constructor(
    private readonly charm: CharmBase,
    private readonly options: ServiceMeshProviderOptions,
  ) {
    this.relationName = options.relationName ?? 'service-mesh';
    charm.observeRelation(this.relationName, ['created', 'joined'], () => this.updateRelations());
  }

  /** Publishes mesh labels and type on every relation. Leader only. */
  updateRelations(): void {
    if (!this.charm.model.isLeader()) return;
    const data = {
      labels: JSON.stringify(this.options.labels()),
      mesh_type: JSON.stringify(this.options.meshType ?? 'istio'),
    };
    for (const relation of this.charm.model.relations(this.relationName)) {
      relation.updateLocalAppData(data);
    }
  }

  /** Every valid policy requested over any relation. */
  meshInfo(): MeshPolicy[] {
    const policies: MeshPolicy[] = [];
    for (const relation of this.charm.model.relations(this.relationName)) {
      const raw = relation.remoteAppData().policies;
      if (!raw) continue;

      const parsed = PoliciesSchema.safeParse(raw);
      if (!parsed.success) {
        this.charm.logger.warn(`Ignoring malformed policies from ${relation.app ?? relation.id}`);
        continue;
      }
      for (const entry of parsed.data) {
        try {
          policies.push(meshPolicyFromWire(entry));
        } catch (error) {
          this.charm.logger.error(`Ignoring invalid policy from ${relation.app ?? relation.id}: ${errorMessage(error)}`);
        }
      }
    }
    return policies;
  }
}
