export type { CharmBackend, RelationInfo } from './backend';
export { CharmBase, parseRelationEvent } from './framework';
export type { CharmEvent, DispatchOptions, EventHandler, HookName, RelationEventKind } from './framework';
export { configDefaults, CharmMetadataSchema, loadCharmMetadata, parseCharmMetadata, relationEndpoints } from './metadata';
export type { CharmMetadata, ConfigValue } from './metadata';
export { Model, Relation } from './model';
export { Status } from './status';
export type { StatusName } from './status';
