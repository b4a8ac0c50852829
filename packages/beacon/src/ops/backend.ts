import type { Status } from './status';

export interface RelationInfo {
  id: number;
  endpoint: string;
  /** Remote application; absent on a peer relation with no other units yet */
  remoteApp?: string;
  remoteUnits: string[];
}

/**
 * Everything a charm needs from the orchestrator during one hook.
 *
 * Calls are synchronous: in a deployed unit each one maps onto a hook
 * tool invocation.
 */
export interface CharmBackend {
  readonly appName: string;
  readonly unitName: string;
  readonly modelName: string;
  readonly modelUuid: string;

  isLeader(): boolean;
  config(): Record<string, unknown>;
  /** Units the application is heading towards, dying units excluded. */
  plannedUnits(): number;

  relationIds(endpoint: string): number[];
  relationInfo(endpoint: string, id: number): RelationInfo;
  /** Reads one bucket of relation data. `member` is an app or unit name. */
  relationGet(endpoint: string, id: number, member: string, app: boolean): Record<string, string>;
  /** Writes the local app or unit bucket. Empty values delete their key. */
  relationSet(endpoint: string, id: number, data: Record<string, string>, app: boolean): void;

  /** Ingress address of this unit on the given endpoint. */
  bindAddress(endpoint: string): string | undefined;

  getStatus(): Status;
  setStatus(status: Status): void;
}
