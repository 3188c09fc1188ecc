import type { AxiosInstance } from 'axios';
import type { IDatabaseService, ILogger, IModule, IModuleMetadata, LookupFunction } from '@plugcat/types';
import { PluginCatalogRepository } from './repositories/index.js';
import { PluginCatalogService } from './services/index.js';

/**
 * Plugin catalog module dependencies for initialization.
 */
export interface IPluginCatalogModuleDependencies {
    database: IDatabaseService;
    http: AxiosInstance;
    logger: ILogger;

    /**
     * Local path or URL of the plugin archive. Populate fails when absent.
     */
    archiveLocation?: string;

    /**
     * Run one synchronization pass from run().
     */
    syncOnStart: boolean;

    /**
     * Aborts the startup pass on shutdown.
     */
    signal?: AbortSignal;
}

/**
 * Wires the catalog repository and synchronization service, and runs the
 * startup synchronization pass.
 *
 * A failed startup pass is logged and does not stop the process; lookups keep
 * serving whatever the catalog already holds.
 */
export class PluginCatalogModule implements IModule<IPluginCatalogModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'plugin-catalog',
        name: 'Plugin Catalog',
        version: '1.0.0',
        description: 'Synchronizes plugin manifests from a zip archive into the catalog'
    };

    private logger: ILogger | null = null;
    private service: PluginCatalogService | null = null;
    private syncOnStart = false;
    private signal: AbortSignal | undefined;

    async init(dependencies: IPluginCatalogModuleDependencies): Promise<void> {
        const logger = dependencies.logger.child({ module: 'plugin-catalog' });
        this.logger = logger;
        logger.info('Initializing plugin catalog module...');

        const repository = new PluginCatalogRepository(dependencies.database);
        await repository.createIndexes();

        this.service = new PluginCatalogService(repository, dependencies.http, dependencies.logger, {
            archiveLocation: dependencies.archiveLocation
        });
        this.syncOnStart = dependencies.syncOnStart;
        this.signal = dependencies.signal;

        logger.info('Plugin catalog module initialized');
    }

    /**
     * Run the startup synchronization pass when enabled.
     */
    async run(): Promise<void> {
        const service = this.getPluginCatalogService();
        const logger = this.getLogger();

        if (!this.syncOnStart) {
            logger.info('Startup plugin synchronization disabled');
            return;
        }

        try {
            const result = await service.populate({ signal: this.signal });
            logger.info({ result }, 'Plugin catalog synchronized');
        } catch (error) {
            logger.error({ error }, 'Plugin catalog synchronization failed');
        }
    }

    /**
     * @throws Error if called before init()
     */
    getPluginCatalogService(): PluginCatalogService {
        if (!this.service) {
            throw new Error('PluginCatalogModule.init() must be called before getPluginCatalogService()');
        }
        return this.service;
    }

    /**
     * Lookup function for step plugins, backed by the catalog.
     *
     * @throws Error if called before init()
     */
    getLookupFn(): LookupFunction {
        return this.getPluginCatalogService().getLookupFn();
    }

    private getLogger(): ILogger {
        if (!this.logger) {
            throw new Error('PluginCatalogModule.init() must be called before run()');
        }
        return this.logger;
    }
}
