import type { ManifestConfig } from './IManifestConfig.js';
import type { IStoreContext } from './IPluginCatalogStore.js';

/**
 * Resolves a plugin manifest by name, kind, type and version for pipeline resolvers.
 *
 * The optional context is forwarded to the catalog store, so an aborted signal
 * rejects the lookup.
 */
export type LookupFunction = (
    name: string,
    kind: string,
    type: string,
    version: string,
    context?: IStoreContext
) => Promise<ManifestConfig>;
