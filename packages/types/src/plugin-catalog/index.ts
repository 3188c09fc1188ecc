/**
 * Plugin catalog type definitions.
 */
export type { IPluginDescriptor, PluginType } from './IPluginDescriptor.js';
export type {
    ManifestConfig,
    IStepPluginManifest,
    IStagePluginManifest,
    IUnrecognizedManifest,
    IPluginStepSpec,
    IPluginStageSpec,
    IPluginInput
} from './IManifestConfig.js';
export type { IPluginCatalogStore, IStoreContext } from './IPluginCatalogStore.js';
export type { IPluginSyncResult } from './IPluginSyncResult.js';
export type { LookupFunction } from './ILookupFunction.js';
