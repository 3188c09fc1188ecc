export { PluginCatalogModule } from './PluginCatalogModule.js';
export type { IPluginCatalogModuleDependencies } from './PluginCatalogModule.js';
export { PluginCatalogRepository } from './repositories/index.js';
export * from './services/index.js';
