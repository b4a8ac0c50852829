import type { KubernetesClient } from '../kubernetes';
import type { CharmBase, Relation } from '../ops';
import { charmLabelsConfigMapName, reconcileCharmLabels } from './charm-labels';
import {
  CrossModelMeshDataSchema,
  jsonString,
  ProviderAppDataSchema,
  type ConsumerPolicy,
  type CrossModelMeshData,
  type MeshPolicy,
  type MeshType,
  type ProviderAppData,
  meshPolicyToWire,
} from './types';

export interface ServiceMeshConsumerOptions {
  policies?: ConsumerPolicy[];
  /** Defaults to service-mesh */
  meshRelationName?: string;
  /** Defaults to require-cmr-mesh */
  crossModelMeshRequiresName?: string;
  /** Defaults to provide-cmr-mesh */
  crossModelMeshProvidesName?: string;
  /** Label our own workload with the provider's mesh labels (defaults to true) */
  autoJoin?: boolean;
  /** Needed for autoJoin */
  kubernetes?: KubernetesClient;
}

const CrossModelMeshAppDataSchema = jsonString(CrossModelMeshDataSchema);

/** Requirer side of the `service_mesh` interface. */
export class ServiceMeshConsumer {
  private readonly meshRelationName: string;
  private readonly crossModelRelationNames: string[];
  private readonly policies: ConsumerPolicy[];
  private readonly autoJoin: boolean;

  constructor(
    private readonly charm: CharmBase,
    private readonly options: ServiceMeshConsumerOptions = {},
  ) {
    this.meshRelationName = options.meshRelationName ?? 'service-mesh';
    this.crossModelRelationNames = [
      options.crossModelMeshRequiresName ?? 'require-cmr-mesh',
      options.crossModelMeshProvidesName ?? 'provide-cmr-mesh',
    ];
    this.policies = options.policies ?? [];
    this.autoJoin = options.autoJoin ?? true;

    const update = () => this.update();
    charm.observeRelation(this.meshRelationName, ['created', 'changed', 'broken'], update);
    charm.observe('upgrade-charm', update);
    for (const relationName of new Set(this.policies.map((policy) => policy.relation))) {
      charm.observeRelation(relationName, ['created', 'broken'], update);
    }
    for (const relationName of this.crossModelRelationNames) {
      charm.observeRelation(relationName, ['created', 'joined', 'changed'], update);
    }
  }

  async update(): Promise<void> {
    this.publishCrossModelData();
    this.updateServiceMesh();
    await this.reconcileLabels();
  }

  /** Publishes our policies to the mesh provider. Leader only. */
  updateServiceMesh(): void {
    const relation = this.charm.model.relation(this.meshRelationName);
    if (!relation || !this.charm.model.isLeader()) return;
    relation.updateLocalAppData({
      policies: JSON.stringify(this.meshPolicies().map(meshPolicyToWire)),
    });
  }

  /** Our policies resolved against the relations that currently exist. */
  meshPolicies(): MeshPolicy[] {
    const crossModel = this.crossModelData();
    const model = this.charm.model;
    const policies: MeshPolicy[] = [];

    for (const policy of this.policies) {
      for (const relation of model.relations(policy.relation)) {
        if (!relation.app) continue;
        const remote = crossModel.get(relation.app);
        const source = {
          sourceAppName: remote?.app_name ?? relation.app,
          sourceNamespace: remote?.juju_model_name ?? model.name,
          targetAppName: model.appName,
          targetNamespace: model.name,
        };
        if (policy.type === 'app') {
          policies.push({ ...source, targetService: policy.service, targetType: 'app', endpoints: policy.endpoints });
        } else {
          policies.push({ ...source, targetType: 'unit', endpoints: [{ ports: policy.ports }] });
        }
      }
    }
    return policies;
  }

  /** Provider data, or undefined while the provider has not published any. */
  providerData(): ProviderAppData | undefined {
    const relation = this.charm.model.relation(this.meshRelationName);
    if (!relation) return undefined;
    const parsed = ProviderAppDataSchema.safeParse(relation.remoteAppData());
    return parsed.success ? parsed.data : undefined;
  }

  labels(): Record<string, string> {
    return this.providerData()?.labels ?? {};
  }

  meshType(): MeshType | undefined {
    return this.providerData()?.mesh_type;
  }

  isRelated(): boolean {
    return this.charm.model.relation(this.meshRelationName) !== undefined;
  }

  private async reconcileLabels(): Promise<void> {
    const client = this.options.kubernetes;
    if (!this.autoJoin || !client || !this.charm.model.isLeader()) return;
    const { appName, name } = this.charm.model;
    await reconcileCharmLabels({
      client,
      appName,
      namespace: name,
      configMapName: charmLabelsConfigMapName(appName),
      labels: this.isRelated() ? this.labels() : {},
    });
  }

  private publishCrossModelData(): void {
    if (!this.charm.model.isLeader()) return;
    const data: CrossModelMeshData = { app_name: this.charm.model.appName, juju_model_name: this.charm.model.name };
    for (const relation of this.crossModelRelations()) {
      relation.updateLocalAppData({ cmr_data: JSON.stringify(data) });
    }
  }

  /** Real app name and model of every remote app behind a cross-model relation. */
  private crossModelData(): Map<string, CrossModelMeshData> {
    const data = new Map<string, CrossModelMeshData>();
    for (const relation of this.crossModelRelations()) {
      if (!relation.app) continue;
      const parsed = CrossModelMeshAppDataSchema.safeParse(relation.remoteAppData().cmr_data);
      if (parsed.success) data.set(relation.app, parsed.data);
    }
    return data;
  }

  private crossModelRelations(): Relation[] {
    return this.crossModelRelationNames.flatMap((name) => this.charm.model.relations(name));
  }
}
