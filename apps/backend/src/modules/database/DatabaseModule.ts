/**
 * Database module implementation.
 *
 * Wraps the connected MongoDB client in a {@link DatabaseService} that every
 * other module receives through dependency injection.
 */

import type { MongoClient } from 'mongodb';
import type { IDatabaseService, ILogger, IModule, IModuleMetadata } from '@keepsake/types';
import { DatabaseService } from './services/database.service.js';

/**
 * Database module dependencies for initialization.
 */
export interface IDatabaseModuleDependencies {
    logger: ILogger;

    /**
     * Connected client from the database loader.
     */
    client: MongoClient;
}

/**
 * Database module for collection access and transactions.
 *
 * ## Lifecycle
 *
 * ### init() phase:
 * - Creates the core DatabaseService
 *
 * ### run() phase:
 * - Verifies the server answers a ping and logs the result
 *
 * @example
 * ```typescript
 * const databaseModule = new DatabaseModule();
 * await databaseModule.init({ logger, client });
 * await databaseModule.run();
 * const database = databaseModule.getDatabaseService();
 * ```
 */
export class DatabaseModule implements IModule<IDatabaseModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'database',
        name: 'Database',
        version: '1.0.0',
        description: 'Collection access and transactions for all application components'
    };

    private logger?: ILogger;
    private databaseService?: DatabaseService;

    async init(dependencies: IDatabaseModuleDependencies): Promise<void> {
        this.logger = dependencies.logger.child({ module: 'database' });
        this.databaseService = new DatabaseService(dependencies.client, this.logger);
        this.logger.info('Database module initialized');
    }

    async run(): Promise<void> {
        const database = this.getDatabaseService();
        const reachable = await database.ping();
        if (reachable) {
            this.logger?.info('Database module running');
        } else {
            this.logger?.error('Database did not answer ping after connect');
        }
    }

    /**
     * Get the core database service instance.
     *
     * @throws {Error} If called before init() completes
     */
    public getDatabaseService(): IDatabaseService {
        if (!this.databaseService) {
            throw new Error('DatabaseModule not initialized. Call init() first.');
        }
        return this.databaseService;
    }
}
