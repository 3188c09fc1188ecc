/**
 * @fileoverview Application entry point with two-phase lifecycle.
 *
 * Connects the database, initializes every module, then runs them. The plugin
 * catalog module performs one synchronization pass during run() when
 * PLUGINS_SYNC_ON_START is set; the process then disconnects and exits.
 *
 * @module index
 */

import { env } from './config/env.js';
import { httpClient } from './lib/http-client.js';
import { logger } from './lib/logger.js';
import { connectDatabase, disconnectDatabase } from './loaders/database.js';
import { DatabaseModule } from './modules/database/index.js';
import { PluginCatalogModule } from './modules/plugin-catalog/index.js';

/**
 * Main application entry point.
 *
 * SIGINT aborts an in-flight synchronization pass; the pass rejects at its next
 * store call and the process shuts down.
 */
async function bootstrap(): Promise<void> {
    const controller = new AbortController();
    const onSigint = (): void => {
        logger.info('Received SIGINT, aborting plugin synchronization');
        controller.abort();
    };
    process.once('SIGINT', onSigint);

    try {
        const connection = await connectDatabase();

        // Phase 1: init
        const databaseModule = new DatabaseModule();
        await databaseModule.init({ logger, connection });

        const pluginCatalogModule = new PluginCatalogModule();
        await pluginCatalogModule.init({
            database: databaseModule.getDatabaseService(),
            http: httpClient,
            logger,
            archiveLocation: env.PLUGINS_ZIP_PATH,
            syncOnStart: env.PLUGINS_SYNC_ON_START,
            signal: controller.signal
        });

        // Phase 2: run
        await databaseModule.run();
        await pluginCatalogModule.run();
    } catch (error) {
        logger.error({ error }, 'Failed to bootstrap plugin catalog');
        process.exitCode = 1;
    } finally {
        process.removeListener('SIGINT', onSigint);
        await disconnectDatabase().catch(error => {
            logger.error({ error }, 'Failed to disconnect from MongoDB');
            process.exitCode = 1;
        });
    }
}

void bootstrap();
