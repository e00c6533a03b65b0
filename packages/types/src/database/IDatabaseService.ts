import type { ClientSession, Collection, Document } from 'mongodb';

/**
 * Database service interface providing unified database access across the application.
 *
 * A thin abstraction over the MongoDB native driver. Services receive it through
 * dependency injection, which keeps them testable with the in-memory mock from
 * `tests/vitest/mocks/database-service.ts`.
 *
 * @example
 * ```typescript
 * const pages = database.getCollection<IPageDocument>('pages');
 * await database.createIndex('pages', { slug: 1 }, { unique: true });
 *
 * await database.withTransaction(async session => {
 *     await pages.updateOne({ _id }, { $set: { title } }, { session });
 * });
 * ```
 */
export interface IDatabaseService {
    /**
     * Get a MongoDB collection for direct access.
     *
     * @param name - Logical collection name
     * @returns MongoDB native collection
     */
    getCollection<T extends Document = Document>(name: string): Collection<T>;

    /**
     * Create an index on a collection.
     *
     * Unique indexes are how uniqueness is enforced at the storage layer: a
     * conflicting insert fails with a duplicate key error (code 11000).
     *
     * @param collectionName - Logical collection name
     * @param indexSpec - Field to direction map, e.g. `{ slug: 1 }`
     * @param options - Index options
     */
    createIndex(
        collectionName: string,
        indexSpec: Record<string, 1 | -1>,
        options?: { unique?: boolean; name?: string }
    ): Promise<void>;

    /**
     * Run work inside a multi-document transaction.
     *
     * Every write issued with the provided session commits together when `work`
     * resolves. If `work` throws, the transaction is aborted and the error is
     * rethrown. The session is always ended.
     *
     * @param work - Callback receiving the transaction session
     */
    withTransaction(work: (session: ClientSession) => Promise<void>): Promise<void>;

    /**
     * Check whether the database answers a ping.
     *
     * @returns True when the server responded
     */
    ping(): Promise<boolean>;
}
