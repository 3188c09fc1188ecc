import type { Collection, CreateIndexesOptions, Document, IndexSpecification } from 'mongodb';

/**
 * Database service interface providing MongoDB access to backend modules.
 *
 * Modules depend on this interface rather than on Mongoose directly, so the
 * catalog repository can run against an in-memory implementation in tests and
 * against the shared Mongoose connection in production.
 *
 * @example
 * ```typescript
 * const collection = database.getCollection<IPluginDocument>('plugins');
 * const plugins = await collection.find({}).toArray();
 *
 * await database.createIndex('plugins', { uid: 1 }, { unique: true });
 * ```
 */
export interface IDatabaseService {
    /**
     * Get a MongoDB collection for direct access.
     *
     * Returns the native driver collection so callers keep full control over
     * filters, projections and update operators.
     *
     * @param name - Logical collection name
     * @returns MongoDB native collection
     * @throws Error if the MongoDB connection is not established
     */
    getCollection<T extends Document = Document>(name: string): Collection<T>;

    /**
     * Create an index on a collection.
     *
     * Index creation is idempotent in MongoDB, so modules call this from their
     * init() phase on every startup.
     *
     * @param collectionName - Logical collection name
     * @param indexSpec - Index key specification
     * @param options - Index options such as uniqueness
     */
    createIndex(
        collectionName: string,
        indexSpec: IndexSpecification,
        options?: CreateIndexesOptions
    ): Promise<void>;
}
