import type { Connection } from 'mongoose';
import type { Collection, CreateIndexesOptions, Document, IndexSpecification } from 'mongodb';
import type { IDatabaseService, ILogger } from '@plugcat/types';

/**
 * Database service providing MongoDB collection access to backend modules.
 *
 * Wraps the shared Mongoose connection and hands out native driver collections,
 * so repositories write plain MongoDB queries while depending only on the
 * `IDatabaseService` interface.
 *
 * @example
 * ```typescript
 * import mongoose from 'mongoose';
 * const db = new DatabaseService(logger, mongoose.connection);
 * const plugins = db.getCollection<IPluginDocument>('plugins');
 * ```
 */
export class DatabaseService implements IDatabaseService {
    private readonly logger: ILogger;
    private readonly connection: Connection;

    /**
     * Create a database service instance.
     *
     * The Mongoose connection is injected so unit tests can pass a stub
     * connection without importing mongoose.
     *
     * @param logger - Logger for database operation logging
     * @param mongooseConnection - Mongoose connection instance
     */
    constructor(logger: ILogger, mongooseConnection: Connection) {
        this.logger = logger;
        this.connection = mongooseConnection;
    }

    /**
     * Validate and sanitize a logical collection name.
     *
     * @param logicalName - The collection name used by the caller
     * @returns The physical collection name in MongoDB
     */
    private getPhysicalCollectionName(logicalName: string): string {
        if (!logicalName) {
            throw new Error('Collection name must be a non-empty string');
        }

        return logicalName.replace(/[^a-zA-Z0-9_-]/g, '_');
    }

    /**
     * Get a MongoDB collection for direct access.
     *
     * @param name - Logical collection name
     * @returns MongoDB native collection
     * @throws Error if MongoDB connection not established
     */
    public getCollection<T extends Document = Document>(name: string): Collection<T> {
        const physicalName = this.getPhysicalCollectionName(name);

        const db = this.connection.db;
        if (!db) {
            throw new Error('MongoDB connection not established');
        }
        return db.collection<T>(physicalName);
    }

    /**
     * Create an index on a collection.
     *
     * @param collectionName - Logical collection name
     * @param indexSpec - Index key specification
     * @param options - Index options (unique, sparse, name)
     */
    public async createIndex(
        collectionName: string,
        indexSpec: IndexSpecification,
        options?: CreateIndexesOptions
    ): Promise<void> {
        const collection = this.getCollection(collectionName);
        await collection.createIndex(indexSpec, options);
        this.logger.info(
            { collection: collectionName, indexSpec },
            'Created collection index'
        );
    }
}
