/**
 * Shared contracts of the action indexer.
 *
 * Framework-independent types consumed by the backend and by anything that
 * reads stored actions: ledger primitives, the closed block union, the action
 * record, the logger contract and the module lifecycle.
 */
export * from './ledger/index.js';
export * from './block/index.js';
export * from './action/index.js';
export type { ILogger } from './logging/ILogger.js';
export type { IModule, IModuleMetadata } from './module/index.js';
