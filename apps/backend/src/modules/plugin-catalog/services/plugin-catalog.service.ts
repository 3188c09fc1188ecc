import type { AxiosInstance } from 'axios';
import type {
    ILogger,
    IPluginCatalogStore,
    IPluginDescriptor,
    IPluginSyncResult,
    IStoreContext,
    LookupFunction,
    ManifestConfig
} from '@plugcat/types';
import { ConfigurationError, LookupError, StoreError, UnsupportedQueryError } from '../../../lib/errors.js';
import { withArchiveSource } from './archive-source.js';
import { CatalogReconciler } from './catalog-reconciler.js';
import type { IParsedPlugin } from './catalog-reconciler.js';
import { createEntryMatcher, extractManifests, MANIFEST_PATTERN } from './manifest-extractor.js';
import { parseManifest, parseManifestEntry } from './manifest-parser.js';
import { ZipArchive } from './zip-archive.js';

export interface IPluginCatalogServiceOptions {
    /**
     * Local path or URL of the plugin archive.
     */
    archiveLocation?: string;

    /**
     * Glob selecting manifest entries inside the archive.
     */
    manifestPattern?: string;
}

/**
 * Keeps the plugin catalog in sync with a zip archive of plugin manifests and
 * serves step plugin lookups from the catalog.
 *
 * A synchronization pass reads the whole catalog once, walks the archive's
 * manifests, and creates or updates only the entries whose content changed.
 * Entries that disappeared from the archive are left in place.
 *
 * @example
 * ```typescript
 * const service = new PluginCatalogService(repository, httpClient, logger, {
 *     archiveLocation: 'https://example.com/plugins.zip'
 * });
 * const result = await service.populate();
 * const lookup = service.getLookupFn();
 * const config = await lookup('docker', 'plugin', 'step', '');
 * ```
 */
export class PluginCatalogService {
    private readonly logger: ILogger;
    private readonly reconciler: CatalogReconciler;

    constructor(
        private readonly store: IPluginCatalogStore,
        private readonly http: AxiosInstance,
        logger: ILogger,
        private readonly options: IPluginCatalogServiceOptions = {}
    ) {
        this.logger = logger.child({ module: 'plugins' });
        this.reconciler = new CatalogReconciler(store, this.logger);
    }

    /**
     * Run one synchronization pass against the configured archive.
     *
     * Per-entry problems (unreadable, unparsable or unsupported manifests, failed
     * writes) are logged and counted. Anything that prevents the pass as a whole
     * rejects.
     *
     * @param context - Optional abort signal forwarded to the download and store calls
     * @throws ConfigurationError if no archive location is configured or the pattern is invalid
     * @throws TransportError if the archive cannot be downloaded
     * @throws IOError if the archive cannot be written locally or opened
     * @throws StoreError if the catalog cannot be listed
     */
    async populate(context: IStoreContext = {}): Promise<IPluginSyncResult> {
        const location = this.options.archiveLocation;
        if (!location) {
            throw new ConfigurationError('plugins path not provided to read schemas from');
        }

        const matches = createEntryMatcher(this.options.manifestPattern ?? MANIFEST_PATTERN);

        return withArchiveSource(
            location,
            async archivePath => {
                const archive = await ZipArchive.open(archivePath);
                try {
                    let existing: IPluginDescriptor[];
                    try {
                        existing = await this.store.listAll(context);
                    } catch (error) {
                        throw new StoreError('could not list plugins', undefined, { cause: error });
                    }

                    const counter = { skipped: 0 };
                    const parsed = this.parsePlugins(archive, matches, counter);
                    const result = await this.reconciler.reconcile(existing, parsed, context);

                    return { ...result, skipped: counter.skipped };
                } finally {
                    archive.close();
                }
            },
            { http: this.http, logger: this.logger, signal: context.signal }
        );
    }

    /**
     * Build the lookup function handed to config resolvers.
     *
     * Only step plugins are served; other kinds and types are refused before the
     * catalog is consulted. The returned function forwards its optional store
     * context to the catalog lookup.
     */
    getLookupFn(): LookupFunction {
        return async (
            name: string,
            kind: string,
            type: string,
            version: string,
            context: IStoreContext = {}
        ): Promise<ManifestConfig> => {
            if (kind !== 'plugin') {
                throw new UnsupportedQueryError('only plugin kind supported', { name, kind });
            }
            if (type !== 'step') {
                throw new UnsupportedQueryError('only step plugins supported', { name, type });
            }

            let plugin: IPluginDescriptor;
            try {
                plugin = await this.store.find(name, version, context);
            } catch (error) {
                throw new LookupError('could not lookup plugin', { name, version }, { cause: error });
            }

            return parseManifest(plugin.spec);
        };
    }

    private *parsePlugins(
        archive: ZipArchive,
        matches: (entryName: string) => boolean,
        counter: { skipped: number }
    ): Generator<IParsedPlugin> {
        const manifests = extractManifests(archive, {
            matches,
            logger: this.logger,
            onSkip: () => {
                counter.skipped++;
            }
        });

        for (const entry of manifests) {
            const descriptor = parseManifestEntry(entry, this.logger);
            if (!descriptor) {
                counter.skipped++;
                continue;
            }
            yield { entryName: entry.entryName, descriptor };
        }
    }
}
