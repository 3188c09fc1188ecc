export type { ILogger } from './logging/ILogger.js';
export type { IDatabaseService } from './database/IDatabaseService.js';
export type { IModule, IModuleMetadata } from './module/index.js';
export * from './plugin-catalog/index.js';
