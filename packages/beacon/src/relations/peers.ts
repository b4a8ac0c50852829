import type { CharmBase } from '../ops';

export interface PeerState {
  waypoint: string;
  modelOnMesh: boolean;
}

/** Leader-written state shared with the other units over the peer relation. */
export class PeerStateStore {
  constructor(
    private readonly charm: CharmBase,
    private readonly relationName = 'peers',
  ) {}

  publish(state: PeerState): void {
    const relation = this.charm.model.relation(this.relationName);
    if (!relation || !this.charm.model.isLeader()) return;
    relation.updateLocalAppData({ waypoint: state.waypoint, 'model-on-mesh': String(state.modelOnMesh) });
  }
}
