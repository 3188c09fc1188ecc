/**
 * Module system type exports.
 */

export type { IModule } from './IModule.js';
export type { IModuleMetadata } from './IModuleMetadata.js';
