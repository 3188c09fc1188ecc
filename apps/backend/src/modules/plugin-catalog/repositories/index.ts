export { PluginCatalogRepository } from './plugin-catalog.repository.js';
