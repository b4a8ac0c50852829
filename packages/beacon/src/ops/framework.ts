import type { Logger } from '../core';
import type { CharmBackend } from './backend';
import { Model, type Relation } from './model';
import type { Status } from './status';

export type RelationEventKind = 'created' | 'joined' | 'changed' | 'departed' | 'broken';

export type HookName =
  | 'install'
  | 'start'
  | 'stop'
  | 'remove'
  | 'config-changed'
  | 'upgrade-charm'
  | 'leader-elected'
  | 'leader-settings-changed'
  | 'update-status'
  | `${string}-relation-${RelationEventKind}`
  | `${string}-pebble-ready`;

export interface CharmEvent {
  name: string;
  /** Set for relation events */
  relation?: Relation;
}

export type EventHandler = (event: CharmEvent) => void | Promise<void>;

export interface DispatchOptions {
  /** Relation id of a relation event */
  relationId?: number;
}

const RELATION_EVENT = /^(.+)-relation-(created|joined|changed|departed|broken)$/;

/** Relation endpoint and event kind encoded in a hook name. */
export function parseRelationEvent(name: string): { endpoint: string; kind: RelationEventKind } | undefined {
  const match = RELATION_EVENT.exec(name);
  if (!match) return undefined;
  const [, endpoint, kind] = match;
  if (!endpoint) return undefined;
  switch (kind) {
    case 'created':
    case 'joined':
    case 'changed':
    case 'departed':
    case 'broken':
      return { endpoint, kind };
    default:
      return undefined;
  }
}

/**
 * Base class for charms.
 *
 * Handlers registered with `observe` run in registration order, one at a
 * time; a handler that throws fails the whole hook.
 */
export abstract class CharmBase {
  readonly model: Model;
  private readonly handlers = new Map<string, EventHandler[]>();

  constructor(
    protected readonly backend: CharmBackend,
    readonly logger: Logger,
  ) {
    this.model = new Model(backend);
  }

  get status(): Status {
    return this.backend.getStatus();
  }

  set status(status: Status) {
    this.backend.setStatus(status);
  }

  /** Address other units reach this one at over `endpoint`. */
  unitAddress(endpoint: string): string | undefined {
    return this.backend.bindAddress(endpoint);
  }

  observe(event: HookName, handler: EventHandler): void {
    const handlers = this.handlers.get(event) ?? [];
    handlers.push(handler);
    this.handlers.set(event, handlers);
  }

  /** Observes the same handler on several relation events of one endpoint. */
  observeRelation(endpoint: string, kinds: RelationEventKind[], handler: EventHandler): void {
    for (const kind of kinds) {
      this.observe(`${endpoint}-relation-${kind}`, handler);
    }
  }

  async dispatch(name: string, options: DispatchOptions = {}): Promise<void> {
    const event: CharmEvent = { name };
    const relationEvent = parseRelationEvent(name);

    if (relationEvent && options.relationId !== undefined) {
      event.relation = this.model.getRelation(relationEvent.endpoint, options.relationId);
      this.model.setBrokenRelation(
        relationEvent.kind === 'broken' ? { endpoint: relationEvent.endpoint, id: options.relationId } : undefined,
      );
    } else {
      this.model.setBrokenRelation(undefined);
    }

    const handlers = this.handlers.get(name) ?? [];
    if (handlers.length === 0) {
      this.logger.debug(`No handler for ${name}`);
      return;
    }
    for (const handler of handlers) {
      await handler(event);
    }
  }
}
