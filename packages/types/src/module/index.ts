/**
 * Module system type exports.
 *
 * Core interfaces for backend modules - permanent infrastructure components that
 * initialize during application bootstrap.
 */

export type { IModule } from './IModule.js';
export type { IModuleMetadata } from './IModuleMetadata.js';
