import type { CharmBackend } from './backend';

export class Relation {
  constructor(
    private readonly backend: CharmBackend,
    public readonly endpoint: string,
    public readonly id: number,
    public readonly app: string | undefined,
    public readonly units: string[],
  ) {}

  remoteAppData(): Record<string, string> {
    if (!this.app) return {};
    return this.backend.relationGet(this.endpoint, this.id, this.app, true);
  }

  /** Leader only. */
  updateLocalAppData(data: Record<string, string>): void {
    this.backend.relationSet(this.endpoint, this.id, data, true);
  }

  updateLocalUnitData(data: Record<string, string>): void {
    this.backend.relationSet(this.endpoint, this.id, data, false);
  }
}

interface RelationKey {
  endpoint: string;
  id: number;
}

export class Model {
  private brokenRelation?: RelationKey;

  constructor(private readonly backend: CharmBackend) {}

  get name(): string {
    return this.backend.modelName;
  }

  get uuid(): string {
    return this.backend.modelUuid;
  }

  get appName(): string {
    return this.backend.appName;
  }

  get unitName(): string {
    return this.backend.unitName;
  }

  get config(): Record<string, unknown> {
    return this.backend.config();
  }

  isLeader(): boolean {
    return this.backend.isLeader();
  }

  plannedUnits(): number {
    return this.backend.plannedUnits();
  }

  /** Marks the relation a `-relation-broken` hook is running for. */
  setBrokenRelation(relation: RelationKey | undefined): void {
    this.brokenRelation = relation;
  }

  /** Live relations on an endpoint; one being broken right now is left out. */
  relations(endpoint: string): Relation[] {
    return this.backend
      .relationIds(endpoint)
      .filter((id) => !(this.brokenRelation?.endpoint === endpoint && this.brokenRelation.id === id))
      .map((id) => this.getRelation(endpoint, id));
  }

  relation(endpoint: string): Relation | undefined {
    return this.relations(endpoint)[0];
  }

  getRelation(endpoint: string, id: number): Relation {
    const info = this.backend.relationInfo(endpoint, id);
    return new Relation(this.backend, endpoint, id, info.remoteApp, info.remoteUnits);
  }
}
