import type { IModuleMetadata } from './IModuleMetadata.js';

/**
 * Core module interface for backend system components.
 *
 * Modules initialize during application bootstrap and stay active for the
 * lifetime of the process. They follow a two-phase lifecycle so every module
 * finishes preparing before any of them starts doing work.
 *
 * ## Phase 1: init(dependencies)
 * - Store injected dependencies, create service instances, validate configuration
 * - Must not start background work or assume other modules are ready
 *
 * ## Phase 2: run()
 * - Start background work (for example the startup catalog synchronization pass)
 * - All injected dependencies are guaranteed to be initialized
 *
 * Failures in either phase are fatal to bootstrap; the error is logged with the
 * module metadata and the process exits.
 *
 * @example
 * ```typescript
 * const module = new PluginCatalogModule();
 * await module.init({ database, http, logger });
 * await module.run();
 * ```
 *
 * @template TDependencies - Typed dependencies object specific to this module
 */
export interface IModule<TDependencies extends object = object> {
    /**
     * Module metadata for introspection and log attribution.
     */
    readonly metadata: IModuleMetadata;

    /**
     * Initialize the module with injected dependencies.
     *
     * @param dependencies - Typed dependencies object specific to this module
     * @throws {Error} If initialization fails (causes application shutdown)
     */
    init(dependencies: TDependencies): Promise<void>;

    /**
     * Run the module after all modules have initialized.
     *
     * @throws {Error} If runtime setup fails (causes application shutdown)
     */
    run(): Promise<void>;
}
