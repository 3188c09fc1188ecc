export { PluginCatalogService } from './plugin-catalog.service.js';
export type { IPluginCatalogServiceOptions } from './plugin-catalog.service.js';
export { CatalogReconciler, descriptorsMatch } from './catalog-reconciler.js';
export type { IParsedPlugin, IReconcileResult } from './catalog-reconciler.js';
export { resolveArchiveSource, withArchiveSource } from './archive-source.js';
export type { IArchiveSourceOptions, IResolvedArchive } from './archive-source.js';
export { createEntryMatcher, extractManifests, MANIFEST_PATTERN, LOGO_FILE_NAME } from './manifest-extractor.js';
export type { IExtractedManifest, IExtractOptions } from './manifest-extractor.js';
export { parseManifest, parseManifestEntry, toPluginDescriptor } from './manifest-parser.js';
export { ZipArchive } from './zip-archive.js';
