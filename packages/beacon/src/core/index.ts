export { BaseConstruct } from './base-construct';
export type { NamespacedConfig } from './base-construct';
export * from './errors';
export { createConsoleLogger, noopLogger } from './logger';
export type { Logger, LogLevel } from './logger';
