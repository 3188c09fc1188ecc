import type { IPluginDescriptor } from './IPluginDescriptor.js';

/**
 * Per-call context handed to every store operation.
 *
 * The signal is owned by the caller of a synchronization pass or lookup; an
 * aborted signal makes the next store call reject.
 */
export interface IStoreContext {
    signal?: AbortSignal;
}

/**
 * Persistent catalog of plugin descriptors, addressed by identifier.
 *
 * The synchronization engine owns no catalog state of its own; it reads and
 * mutates the catalog exclusively through these four operations.
 */
export interface IPluginCatalogStore {
    /**
     * List every descriptor in the catalog.
     */
    listAll(context?: IStoreContext): Promise<IPluginDescriptor[]>;

    /**
     * Find a descriptor by identifier and version.
     *
     * @throws NotFoundError when no descriptor matches
     */
    find(uid: string, version: string, context?: IStoreContext): Promise<IPluginDescriptor>;

    /**
     * Insert a new descriptor.
     *
     * @throws ConflictError when the identifier already exists
     */
    create(descriptor: IPluginDescriptor, context?: IStoreContext): Promise<void>;

    /**
     * Replace the content of an existing descriptor.
     *
     * @throws NotFoundError when the identifier does not exist
     */
    update(descriptor: IPluginDescriptor, context?: IStoreContext): Promise<void>;
}
