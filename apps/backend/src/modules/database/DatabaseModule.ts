/**
 * Database module implementation.
 *
 * Owns the core DatabaseService that every other module receives through
 * dependency injection. It initializes first during bootstrap so later modules
 * can create their indexes in their own init() phase.
 */

import type { Connection } from 'mongoose';
import type { IDatabaseService, ILogger, IModule, IModuleMetadata } from '@plugcat/types';
import { DatabaseService } from './services/database.service.js';

/**
 * Database module dependencies for initialization.
 */
export interface IDatabaseModuleDependencies {
    /**
     * Logger for database operations. Exists before any module initializes.
     */
    logger: ILogger;

    /**
     * Established Mongoose connection shared by the process.
     */
    connection: Connection;
}

export class DatabaseModule implements IModule<IDatabaseModuleDependencies> {
    /**
     * Module metadata for introspection and logging.
     */
    readonly metadata: IModuleMetadata = {
        id: 'database',
        name: 'Database',
        version: '1.0.0',
        description: 'MongoDB collection access for all application components'
    };

    private logger: ILogger | null = null;

    /**
     * Core database service instance, created during init().
     */
    private databaseService: DatabaseService | null = null;

    /**
     * Initialize the database module with injected dependencies.
     *
     * @param dependencies - Logger and Mongoose connection
     */
    async init(dependencies: IDatabaseModuleDependencies): Promise<void> {
        const logger = dependencies.logger.child({ module: 'database' });
        this.logger = logger;
        logger.info('Initializing database module...');

        this.databaseService = new DatabaseService(logger, dependencies.connection);

        logger.info('Database module initialized');
    }

    /**
     * The database module has nothing to start; it only serves collections.
     */
    async run(): Promise<void> {
        this.logger?.info('Database module running');
    }

    /**
     * Get the core database service.
     *
     * @returns Database service shared with other modules
     * @throws Error if called before init()
     */
    public getDatabaseService(): IDatabaseService {
        if (!this.databaseService) {
            throw new Error('DatabaseModule.init() must be called before getDatabaseService()');
        }
        return this.databaseService;
    }
}
