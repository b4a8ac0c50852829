import { deepmerge } from 'deepmerge-ts';
import { configDefaults, Status, type CharmBackend, type CharmMetadata, type RelationInfo } from '../ops';

export interface RelationSpec {
  endpoint: string;
  id?: number;
  remoteApp?: string;
  remoteUnits?: string[];
  remoteAppData?: Record<string, string>;
  remoteUnitsData?: Record<string, Record<string, string>>;
  localAppData?: Record<string, string>;
  localUnitData?: Record<string, string>;
}

interface RelationState {
  info: RelationInfo;
  remoteAppData: Record<string, string>;
  remoteUnitsData: Record<string, Record<string, string>>;
  localAppData: Record<string, string>;
  localUnitData: Record<string, string>;
}

export interface InMemoryBackendOptions {
  metadata?: CharmMetadata;
  /** Defaults to the metadata name */
  appName?: string;
  /** Defaults to `<app>/0` */
  unitName?: string;
  modelName?: string;
  modelUuid?: string;
  leader?: boolean;
  /** Overrides on top of the metadata defaults */
  config?: Record<string, unknown>;
  plannedUnits?: number;
  relations?: RelationSpec[];
  address?: string;
}

/** Orchestrator stand-in for tests: relations, config and status live in memory. */
export class InMemoryBackend implements CharmBackend {
  readonly appName: string;
  readonly unitName: string;
  readonly modelName: string;
  readonly modelUuid: string;
  readonly statusHistory: Status[] = [];

  private leader: boolean;
  private configOverrides: Record<string, unknown>;
  private planned: number;
  private address?: string;
  private nextRelationId = 0;
  private readonly relations = new Map<number, RelationState>();

  constructor(private readonly options: InMemoryBackendOptions = {}) {
    this.appName = options.appName ?? options.metadata?.name ?? 'app';
    this.unitName = options.unitName ?? `${this.appName}/0`;
    this.modelName = options.modelName ?? 'test-model';
    this.modelUuid = options.modelUuid ?? '00000000-0000-4000-8000-000000000000';
    this.leader = options.leader ?? false;
    this.configOverrides = options.config ?? {};
    this.planned = options.plannedUnits ?? 1;
    this.address = options.address ?? '10.1.0.10';
    for (const relation of options.relations ?? []) this.addRelation(relation);
  }

  // --- Test controls ---

  setLeader(leader: boolean): void {
    this.leader = leader;
  }

  setConfig(config: Record<string, unknown>): void {
    this.configOverrides = { ...this.configOverrides, ...config };
  }

  setPlannedUnits(units: number): void {
    this.planned = units;
  }

  addRelation(spec: RelationSpec): number {
    const id = spec.id ?? this.nextRelationId;
    this.nextRelationId = Math.max(this.nextRelationId, id) + 1;
    this.relations.set(id, {
      info: { id, endpoint: spec.endpoint, remoteApp: spec.remoteApp, remoteUnits: spec.remoteUnits ?? [] },
      remoteAppData: { ...spec.remoteAppData },
      remoteUnitsData: { ...spec.remoteUnitsData },
      localAppData: { ...spec.localAppData },
      localUnitData: { ...spec.localUnitData },
    });
    return id;
  }

  removeRelation(id: number): void {
    this.relations.delete(id);
  }

  updateRemoteAppData(id: number, data: Record<string, string>): void {
    this.state(id).remoteAppData = { ...this.state(id).remoteAppData, ...data };
  }

  /** Local app bucket of a relation, as the remote side would read it. */
  localAppData(id: number): Record<string, string> {
    return { ...this.state(id).localAppData };
  }

  localUnitData(id: number): Record<string, string> {
    return { ...this.state(id).localUnitData };
  }

  // --- CharmBackend ---

  isLeader(): boolean {
    return this.leader;
  }

  config(): Record<string, unknown> {
    const defaults = this.options.metadata ? configDefaults(this.options.metadata) : {};
    return deepmerge(defaults, this.configOverrides);
  }

  plannedUnits(): number {
    return this.planned;
  }

  relationIds(endpoint: string): number[] {
    return [...this.relations.values()].filter((r) => r.info.endpoint === endpoint).map((r) => r.info.id);
  }

  relationInfo(endpoint: string, id: number): RelationInfo {
    const state = this.state(id);
    if (state.info.endpoint !== endpoint) throw new Error(`relation ${id} is not on ${endpoint}`);
    return { ...state.info, remoteUnits: [...state.info.remoteUnits] };
  }

  relationGet(endpoint: string, id: number, member: string, app: boolean): Record<string, string> {
    const state = this.state(id);
    if (app && member === this.appName) return { ...state.localAppData };
    if (!app && member === this.unitName) return { ...state.localUnitData };
    if (app && member === state.info.remoteApp) return { ...state.remoteAppData };
    return { ...state.remoteUnitsData[member] };
  }

  relationSet(endpoint: string, id: number, data: Record<string, string>, app: boolean): void {
    if (app && !this.leader) throw new Error('only the leader can write application relation data');
    const state = this.state(id);
    const bucket = app ? state.localAppData : state.localUnitData;
    for (const [key, value] of Object.entries(data)) {
      if (value === '') delete bucket[key];
      else bucket[key] = value;
    }
  }

  bindAddress(): string | undefined {
    return this.address;
  }

  getStatus(): Status {
    return this.statusHistory[this.statusHistory.length - 1] ?? Status.unknown();
  }

  setStatus(status: Status): void {
    this.statusHistory.push(status);
  }

  private state(id: number): RelationState {
    const state = this.relations.get(id);
    if (!state) throw new Error(`no relation ${id}`);
    return state;
  }
}
