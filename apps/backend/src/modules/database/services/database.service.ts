import type { ClientSession, Collection, Document, MongoClient } from 'mongodb';
import type { IDatabaseService, ILogger } from '@keepsake/types';

/**
 * Database service providing collection access and transactions over the
 * MongoDB native driver.
 *
 * Repositories depend on the {@link IDatabaseService} interface, so tests swap
 * in the in-memory mock without touching a server.
 *
 * @example
 * ```typescript
 * const db = new DatabaseService(client, logger);
 * await db.createIndex('pages', { slug: 1 }, { unique: true });
 * await db.withTransaction(async session => {
 *     await db.getCollection('pages').updateOne({ slug }, { $set: { title } }, { session });
 * });
 * ```
 */
export class DatabaseService implements IDatabaseService {
    private readonly logger: ILogger;

    /**
     * @param client - Connected MongoDB client
     * @param logger - Logger for index and transaction events
     * @param options.dbName - Database name; defaults to the one in the connection string
     */
    constructor(private readonly client: MongoClient, logger: ILogger, private readonly options: { dbName?: string } = {}) {
        this.logger = logger;
    }

    /**
     * Sanitize a logical collection name.
     *
     * @throws Error if the name is empty
     */
    private getPhysicalCollectionName(logicalName: string): string {
        if (!logicalName) {
            throw new Error('Collection name must be a non-empty string');
        }
        return logicalName.replace(/[^a-zA-Z0-9_-]/g, '_');
    }

    public getCollection<T extends Document = Document>(name: string): Collection<T> {
        return this.client.db(this.options.dbName).collection<T>(this.getPhysicalCollectionName(name));
    }

    /**
     * Create an index on a collection. Idempotent: an existing identical index is kept.
     */
    public async createIndex(
        collectionName: string,
        indexSpec: Record<string, 1 | -1>,
        options?: { unique?: boolean; name?: string }
    ): Promise<void> {
        const collection = this.getCollection(collectionName);
        await collection.createIndex(indexSpec, options ?? {});
        this.logger.info({ collection: collectionName, indexSpec }, 'Ensured collection index');
    }

    /**
     * Run work inside a multi-document transaction.
     *
     * The driver commits when `work` resolves and aborts when it rejects; the
     * session is ended either way. Transient errors are retried by the driver,
     * so `work` must not have side effects outside the database.
     */
    public async withTransaction(work: (session: ClientSession) => Promise<void>): Promise<void> {
        const session = this.client.startSession();
        try {
            await session.withTransaction(async () => {
                await work(session);
            });
        } catch (error) {
            this.logger.warn({ error }, 'Transaction aborted');
            throw error;
        } finally {
            await session.endSession();
        }
    }

    public async ping(): Promise<boolean> {
        try {
            await this.client.db(this.options.dbName).command({ ping: 1 });
            return true;
        } catch (error) {
            this.logger.warn({ error }, 'Database ping failed');
            return false;
        }
    }
}
